import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

/**
 * Writes a small Financial Statement Data Sets directory (sub.txt, num.txt)
 * into a fresh temp dir.
 */

export const SUB_HEADER = ['adsh', 'cik', 'name', 'sic', 'countryba', 'form', 'fye', 'period', 'fy', 'fp', 'filed', 'detail', 'instance'];
export const NUM_HEADER = ['adsh', 'tag', 'version', 'coreg', 'ddate', 'qtrs', 'uom', 'value', 'footnote'];

export interface SubRow {
  adsh: string;
  name: string;
  sic?: string;
  form?: string;
  period?: string;
  fy?: string;
  fp?: string;
}

export interface NumRow {
  adsh: string;
  tag: string;
  value: string;
  ddate?: string;
  qtrs?: string;
  uom?: string;
  coreg?: string;
}

export function subLine(row: SubRow): string {
  return [
    row.adsh, '1000', row.name, row.sic ?? '3571', 'US', row.form ?? '10-Q', '1231',
    row.period ?? '20190630', row.fy ?? '2019', row.fp ?? 'Q2', '20190801', '0', `${row.adsh}.xml`,
  ].join('\t');
}

export function numLine(row: NumRow): string {
  return [
    row.adsh, row.tag, 'us-gaap/2019', row.coreg ?? '', row.ddate ?? '20190630',
    row.qtrs ?? '0', row.uom ?? 'USD', row.value, '',
  ].join('\t');
}

export function writeDataset(subs: SubRow[], nums: NumRow[]): string {
  const dir = mkdtempSync(join(tmpdir(), 'fsds-'));
  writeFileSync(join(dir, 'sub.txt'), [SUB_HEADER.join('\t'), ...subs.map(subLine)].join('\n') + '\n');
  writeFileSync(join(dir, 'num.txt'), [NUM_HEADER.join('\t'), ...nums.map(numLine)].join('\n') + '\n');
  return dir;
}
