import type { PipelineResult } from '../core/pipeline.js';

/**
 * Renders pipeline results as structured JSON for programmatic use.
 */

export function renderRatioJson(result: PipelineResult): string {
  return JSON.stringify(serializePipelineResult(result), null, 2);
}

export function serializePipelineResult(result: PipelineResult) {
  return {
    period: { fiscal_year: result.year, fiscal_period: result.quarter },
    stats: result.stats,
    companies: result.rows.map(row => {
      const industry = result.industries?.get(row.company);
      return {
        name: row.company,
        ...(industry ? { sic: industry.sic, industry_title: industry.industryTitle } : {}),
        canonical: row.canonical,
        ratios: row.ratios,
      };
    }),
    ...(result.log_rows ? {
      log_features: result.log_rows.map(row => ({ name: row.company, ...row.features })),
    } : {}),
    dropped: result.dropped,
  };
}
