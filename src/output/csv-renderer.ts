/**
 * Renders ratio tables as CSV for spreadsheet import.
 */

import { csvEscape } from './format-utils.js';
import { ALL_CONCEPT_COLUMNS } from '../processing/priority-resolver.js';
import { LOG_FEATURE_COLUMNS } from '../processing/ratio-engine.js';
import { RATIO_DEFINITIONS } from '../processing/ratio-definitions.js';
import type { CompanyIndustry } from '../core/sic-client.js';
import type { FeatureRow, IdentityColumn, LogFeatureRow } from '../core/types.js';

const IDENTITY_COLUMNS: readonly IdentityColumn[] = ['Assets_', 'Liabilities_', 'Equity_'];

export function renderRatioCsv(rows: FeatureRow[], industries: Map<string, CompanyIndustry> | null = null): string {
  const lines: string[] = [];
  const ratioIds = RATIO_DEFINITIONS.map(r => r.id);

  const header = ['name'];
  if (industries) header.push('sic', 'industry_title');
  header.push(...IDENTITY_COLUMNS, ...ALL_CONCEPT_COLUMNS, ...ratioIds);
  lines.push(header.join(','));

  for (const row of rows) {
    const cells = [csvEscape(row.company)];
    if (industries) {
      const industry = industries.get(row.company);
      cells.push(industry?.sic != null ? industry.sic.toString() : '', csvEscape(industry?.industryTitle ?? ''));
    }
    for (const column of IDENTITY_COLUMNS) cells.push(row.canonical[column].toString());
    for (const column of ALL_CONCEPT_COLUMNS) cells.push(row.canonical[column].toString());
    for (const id of ratioIds) cells.push(row.ratios[id].toString());
    lines.push(cells.join(','));
  }

  return lines.join('\n');
}

export function renderLogFeatureCsv(rows: LogFeatureRow[]): string {
  const lines: string[] = [['name', ...LOG_FEATURE_COLUMNS].join(',')];
  for (const row of rows) {
    lines.push([
      csvEscape(row.company),
      ...LOG_FEATURE_COLUMNS.map(column => row.features[column].toString()),
    ].join(','));
  }
  return lines.join('\n');
}
