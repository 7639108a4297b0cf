/**
 * Core pipeline execution engine.
 *
 * Wires the dataset loaders, fact selection, reshaping and ratio derivation
 * into reusable functions that return data (not print to console). Used by
 * the CLI, the web API and the MCP server.
 */

import { loadCompanyData, loadCompanyFacts } from './dataset-loader.js';
import { fetchSicCodes, joinIndustry, type CompanyIndustry } from './sic-client.js';
import { ConceptNotFoundError, SchemaMismatchError, SourceUnavailableError, StructuralViolationError } from './errors.js';
import { DATA_DIR, DEFAULT_QUARTER, DEFAULT_YEAR, SIC_CODES_URL } from './config.js';
import {
  CONCEPT_DEFINITIONS,
  canonicalColumnPairs,
  collectAllTags,
  loadConceptDefinitions,
} from '../processing/concept-definitions.js';
import { joinCompanyFacts, selectFacts } from '../processing/fact-selector.js';
import { pivotFacts } from '../processing/wide-reshaper.js';
import {
  calculateRatios,
  logFeatures,
  replaceNonFinite,
  type RatioOptions,
  type RatioTableResult,
} from '../processing/ratio-engine.js';
import type { ConceptDefinition, Fact, FeatureRow, LogFeatureRow, Submission, WideTable } from './types.js';

export { calculateRatios, logFeatures, type RatioOptions, type RatioTableResult };

export interface FinancialsResult {
  table: WideTable;
  stats: {
    joined_facts: number;
    filtered_facts: number;
    selected_facts: number;
    companies: number;
  };
}

/**
 * Join facts to the submission subset, keep the requested tags and pivot to
 * one row per company.
 */
export function loadCompanyFinancials(
  submissions: Submission[],
  facts: Fact[],
  tags: Iterable<string>
): FinancialsResult {
  const joined = joinCompanyFacts(submissions, facts);
  const selection = selectFacts(joined, tags);
  const table = pivotFacts(selection.facts);

  return {
    table,
    stats: {
      joined_facts: selection.input_count,
      filtered_facts: selection.filtered_count,
      selected_facts: selection.output_count,
      companies: table.rows.length,
    },
  };
}

export interface PipelineParams {
  dataDir?: string;
  year?: number;
  quarter?: string;
  /** Path to a concept mapping file; defaults to data/concepts.json */
  conceptsPath?: string;
  /** Value substituted for non-finite ratios */
  defaultValue?: number;
  includeLog?: boolean;
  includeIndustry?: boolean;
  /** SIC code page used when includeIndustry is set */
  sicCodesUrl?: string;
}

export interface PipelineStats {
  filings: number;
  companies: number;
  facts_loaded: number;
  facts_selected: number;
  companies_with_facts: number;
  companies_dropped: number;
  companies_retained: number;
}

export interface PipelineResult {
  year: number;
  quarter: string;
  rows: FeatureRow[];
  log_rows: LogFeatureRow[] | null;
  dropped: string[];
  industries: Map<string, CompanyIndustry> | null;
  submissions: Submission[];
  concepts: ConceptDefinition[];
  stats: PipelineStats;
}

export type PipelineErrorType =
  | 'source_unavailable'
  | 'schema_mismatch'
  | 'structural_violation'
  | 'invalid_params'
  | 'no_data';

export interface PipelineError {
  type: PipelineErrorType;
  message: string;
  source?: string;
  missingColumns?: string[];
}

export type PipelineEngineResult =
  | { success: true; result: PipelineResult }
  | { success: false; error: PipelineError };

/** Map a thrown error onto the engine's error envelope; rethrows unknown errors */
export function classifyError(err: unknown): PipelineError {
  if (err instanceof SourceUnavailableError) {
    return { type: 'source_unavailable', message: err.message, source: err.source };
  }
  if (err instanceof SchemaMismatchError) {
    return { type: 'schema_mismatch', message: err.message, source: err.source, missingColumns: err.missingColumns };
  }
  if (err instanceof StructuralViolationError) {
    return { type: 'structural_violation', message: err.message };
  }
  if (err instanceof ConceptNotFoundError) {
    return { type: 'invalid_params', message: err.message };
  }
  throw err;
}

/**
 * Run the whole ratio pipeline for one filing cohort.
 * Returns structured data and never prints to console.
 */
export async function runRatioPipeline(params: PipelineParams = {}): Promise<PipelineEngineResult> {
  const {
    dataDir = DATA_DIR,
    year = DEFAULT_YEAR,
    quarter = DEFAULT_QUARTER,
    conceptsPath,
    defaultValue = 0,
    includeLog = false,
    includeIndustry = false,
    sicCodesUrl = SIC_CODES_URL,
  } = params;

  if (!Number.isInteger(year)) {
    return { success: false, error: { type: 'invalid_params', message: `Invalid fiscal year: ${year}` } };
  }
  if (!/^Q[1-4]$/.test(quarter)) {
    return { success: false, error: { type: 'invalid_params', message: `Invalid fiscal period: "${quarter}" (expected Q1-Q4)` } };
  }
  if (!Number.isFinite(defaultValue)) {
    return { success: false, error: { type: 'invalid_params', message: 'Default ratio value must be a finite number' } };
  }

  try {
    const concepts = conceptsPath ? loadConceptDefinitions(conceptsPath) : CONCEPT_DEFINITIONS;

    const selection = await loadCompanyData({ dataDir, year, quarter });
    if (selection.company_count === 0) {
      return {
        success: false,
        error: { type: 'no_data', message: `No 10-Q filings found for FY${year} ${quarter} in ${dataDir}` },
      };
    }

    const facts = await loadCompanyFacts(dataDir, selection.submissions);
    const financials = loadCompanyFinancials(selection.submissions, facts, collectAllTags(concepts));

    const ratioTable = calculateRatios(financials.table, canonicalColumnPairs(concepts), {
      policy: replaceNonFinite(defaultValue),
    });

    const industries = includeIndustry
      ? joinIndustry(ratioTable.rows.map(r => r.company), selection.submissions, await fetchSicCodes(sicCodesUrl))
      : null;

    return {
      success: true,
      result: {
        year,
        quarter,
        rows: ratioTable.rows,
        log_rows: includeLog ? logFeatures(ratioTable.rows) : null,
        dropped: ratioTable.dropped,
        industries,
        submissions: selection.submissions,
        concepts,
        stats: {
          filings: selection.filing_count,
          companies: selection.company_count,
          facts_loaded: facts.length,
          facts_selected: financials.stats.selected_facts,
          companies_with_facts: financials.stats.companies,
          companies_dropped: ratioTable.dropped.length,
          companies_retained: ratioTable.rows.length,
        },
      },
    };
  } catch (err) {
    return { success: false, error: classifyError(err) };
  }
}
