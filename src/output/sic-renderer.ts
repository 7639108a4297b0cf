import chalk from 'chalk';
import { csvEscape, padRight } from './format-utils.js';
import type { SicCode } from '../core/types.js';

export function renderSicTable(codes: SicCode[], filter?: string): string {
  const needle = filter?.toLowerCase();
  const shown = needle
    ? codes.filter(c => c.industryTitle.toLowerCase().includes(needle) || c.office.toLowerCase().includes(needle))
    : codes;

  const lines: string[] = [];
  lines.push(`  ${chalk.underline(padRight('SIC', 8))}${chalk.underline(padRight('Office', 36))}${chalk.underline('Industry Title')}`);
  for (const c of shown) {
    lines.push(`  ${padRight(c.sicCode.toString(), 8)}${padRight(c.office, 36)}${c.industryTitle}`);
  }
  lines.push('');
  lines.push(chalk.dim(`  ${shown.length} of ${codes.length} SIC codes`));
  return lines.join('\n');
}

export function renderSicCsv(codes: SicCode[]): string {
  const lines = ['sic_code,office,industry_title'];
  for (const c of codes) {
    lines.push(`${c.sicCode},${csvEscape(c.office)},${csvEscape(c.industryTitle)}`);
  }
  return lines.join('\n');
}
