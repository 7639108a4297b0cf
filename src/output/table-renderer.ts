import chalk from 'chalk';
import { padRight, truncate } from './format-utils.js';
import { RATIO_DEFINITIONS, type RatioDefinition } from '../processing/ratio-definitions.js';
import type { PipelineResult } from '../core/pipeline.js';
import type { ConceptDefinition, Submission } from '../core/types.js';

/**
 * Renders pipeline results as formatted terminal tables.
 */

const RATIO_LABELS: Record<RatioDefinition['id'], string> = {
  ROE_: 'ROE',
  ROA_: 'ROA',
  ProfitMargin_: 'Margin',
  EquityMultiplier_: 'EqMult',
  FixedAssetsToNetWorth_: 'FA/NW',
  DebtToNetWorth_: 'D/NW',
  AssetTurnover_: 'AstTurn',
  InventoryTurnover_: 'InvTurn',
  DaysReceivables_: 'DSO',
  QuickRatio_: 'Quick',
};

const NAME_WIDTH = 34;
const VALUE_WIDTH = 11;

export function renderRatioTable(result: PipelineResult, limit?: number): string {
  const { rows, stats, industries } = result;
  const shown = limit !== undefined ? rows.slice(0, limit) : rows;
  const lines: string[] = [];

  const header = `Financial Ratios — FY${result.year} ${result.quarter} (${stats.companies_retained} companies)`;
  lines.push(chalk.bold(header));
  lines.push(chalk.dim('='.repeat(header.length)));
  lines.push('');

  const columns = [
    padRight('Company', NAME_WIDTH),
    padRight('Assets', VALUE_WIDTH),
    ...RATIO_DEFINITIONS.map(r => padRight(RATIO_LABELS[r.id], VALUE_WIDTH)),
  ];
  lines.push(`  ${columns.map(c => chalk.underline(c)).join('')}`);

  for (const row of shown) {
    const cells = [
      padRight(truncate(row.company, NAME_WIDTH - 2), NAME_WIDTH),
      padRight(formatCurrency(row.canonical.Assets_), VALUE_WIDTH),
      ...RATIO_DEFINITIONS.map(r => padRight(formatRatioValue(row.ratios[r.id], r.format), VALUE_WIDTH)),
    ];
    lines.push(`  ${cells.join('')}`);

    const industry = industries?.get(row.company);
    if (industry?.industryTitle) {
      lines.push(chalk.dim(`    SIC ${industry.sic}: ${industry.industryTitle}`));
    }
  }

  if (shown.length < rows.length) {
    lines.push(chalk.dim(`  ... ${rows.length - shown.length} more (use --limit or --csv for the full table)`));
  }

  lines.push('');
  lines.push(chalk.dim('  -- Pipeline ' + '-'.repeat(47)));
  lines.push(chalk.dim(`  Filings:   ${stats.filings} 10-Q filings, ${stats.companies} after dedup by company name`));
  lines.push(chalk.dim(`  Facts:     ${stats.facts_loaded} loaded, ${stats.facts_selected} selected`));
  lines.push(chalk.dim(`  Companies: ${stats.companies_with_facts} with facts, ${stats.companies_dropped} dropped (balance sheet identity unresolved)`));

  return lines.join('\n');
}

export function renderConceptList(concepts: ConceptDefinition[]): string {
  const lines: string[] = [chalk.bold('\nCanonical Concepts\n')];
  for (const c of concepts) {
    lines.push(`  ${chalk.cyan(c.id.padEnd(24))} ${c.display_name}${c.column ? chalk.dim(` → ${c.column}`) : ''}`);
    lines.push(`  ${''.padEnd(24)} ${chalk.dim(c.description)}`);
    lines.push(`  ${''.padEnd(24)} ${chalk.dim('Tags: ' + c.tags.join(', '))}`);
    lines.push('');
  }
  return lines.join('\n');
}

export function renderCompanyList(submissions: Submission[], limit?: number): string {
  const shown = limit !== undefined ? submissions.slice(0, limit) : submissions;
  const lines: string[] = [];
  lines.push(`  ${chalk.underline(padRight('Company', 42))}${chalk.underline(padRight('SIC', 6))}${chalk.underline(padRight('Period', 10))}${chalk.underline('Accession')}`);
  for (const s of shown) {
    lines.push(`  ${padRight(truncate(s.name, 40), 42)}${padRight(s.sic?.toString() ?? '--', 6)}${padRight(s.period, 10)}${s.adsh}`);
  }
  if (shown.length < submissions.length) {
    lines.push(chalk.dim(`  ... ${submissions.length - shown.length} more`));
  }
  return lines.join('\n');
}

export function formatRatioValue(value: number, format: RatioDefinition['format']): string {
  switch (format) {
    case 'percentage':
      return `${(value * 100).toFixed(1)}%`;
    case 'multiple':
      return `${value.toFixed(2)}x`;
    case 'days':
      return `${value.toFixed(1)}d`;
  }
}

export function formatCurrency(value: number): string {
  const abs = Math.abs(value);
  const sign = value < 0 ? '-' : '';

  if (abs >= 1e12) return `${sign}$${(abs / 1e12).toFixed(2)}T`;
  if (abs >= 1e9) return `${sign}$${(abs / 1e9).toFixed(2)}B`;
  if (abs >= 1e6) return `${sign}$${(abs / 1e6).toFixed(2)}M`;
  if (abs >= 1e3) return `${sign}$${(abs / 1e3).toFixed(2)}K`;
  return `${sign}$${abs.toFixed(0)}`;
}
