import { open, type FileHandle } from 'node:fs/promises';
import { join } from 'node:path';
import { parse } from 'csv-parse';
import { SchemaMismatchError, SourceUnavailableError } from './errors.js';
import { FACTS_FILE, SUBMISSIONS_FILE } from './config.js';
import type { Fact, Submission } from './types.js';

/**
 * Loaders for the SEC Financial Statement Data Sets.
 *
 * sub.txt and num.txt are tab-separated with a header row and no quoting.
 * Both are streamed; num.txt can run to millions of rows, so facts are
 * filtered to the submission subset while reading.
 */

export const SUBMISSION_COLUMNS = [
  'adsh', 'name', 'sic', 'countryba', 'form', 'fye', 'period', 'fy', 'fp', 'detail', 'instance',
] as const;

export const FACT_COLUMNS = [
  'adsh', 'tag', 'ddate', 'qtrs', 'coreg', 'value', 'uom', 'footnote',
] as const;

export const QUARTERLY_FORM = '10-Q';

interface TsvRow {
  get(column: string): string;
}

async function readTsv(
  path: string,
  required: readonly string[],
  onRow: (row: TsvRow) => void
): Promise<number> {
  let handle: FileHandle;
  try {
    handle = await open(path, 'r');
  } catch (err) {
    throw new SourceUnavailableError(
      `Could not open ${path}: ${err instanceof Error ? err.message : String(err)}`,
      path
    );
  }

  const parser = parse({
    delimiter: '\t',
    quote: false,
    bom: true,
    relax_column_count: true,
    skip_empty_lines: true,
  });
  const input = handle.createReadStream({ encoding: 'utf8' });
  // pipe() does not forward read errors; surface them through the parser
  input.on('error', err => parser.destroy(err));
  input.pipe(parser);

  let columnIndex: Map<string, number> | null = null;
  let rows = 0;

  try {
    for await (const record of parser) {
      const cells: unknown = record;
      if (!Array.isArray(cells)) continue;
      const fields = cells.map(c => String(c));

      if (columnIndex === null) {
        const index = new Map<string, number>();
        fields.forEach((name, i) => index.set(name.trim(), i));
        const missing = required.filter(c => !index.has(c));
        if (missing.length > 0) {
          throw new SchemaMismatchError(
            `${path} is missing required columns: ${missing.join(', ')}`,
            path,
            missing
          );
        }
        columnIndex = index;
        continue;
      }

      const lookup = columnIndex;
      onRow({
        get: column => {
          const i = lookup.get(column);
          return i === undefined ? '' : fields[i] ?? '';
        },
      });
      rows++;
    }
  } catch (err) {
    if (err instanceof SchemaMismatchError) throw err;
    throw new SourceUnavailableError(
      `Failed reading ${path}: ${err instanceof Error ? err.message : String(err)}`,
      path
    );
  } finally {
    await handle.close();
  }

  if (columnIndex === null) {
    throw new SchemaMismatchError(`${path} has no header row`, path, [...required]);
  }
  return rows;
}

function parseOptionalInt(raw: string): number | null {
  if (raw.trim() === '') return null;
  const n = parseInt(raw, 10);
  return Number.isNaN(n) ? null : n;
}

function parseOptionalFloat(raw: string): number | null {
  if (raw.trim() === '') return null;
  const n = Number(raw);
  return Number.isNaN(n) ? null : n;
}

function emptyToNull(raw: string): string | null {
  return raw === '' ? null : raw;
}

/** Load every submission in a sub.txt file */
export async function loadSubmissions(path: string): Promise<Submission[]> {
  const submissions: Submission[] = [];
  await readTsv(path, SUBMISSION_COLUMNS, row => {
    submissions.push({
      adsh: row.get('adsh'),
      name: row.get('name'),
      sic: parseOptionalInt(row.get('sic')),
      countryba: row.get('countryba'),
      form: row.get('form'),
      fye: row.get('fye'),
      period: row.get('period'),
      fy: parseOptionalInt(row.get('fy')),
      fp: row.get('fp'),
      detail: row.get('detail'),
      instance: row.get('instance'),
    });
  });
  return submissions;
}

/**
 * Load facts from a num.txt file.
 * When adshFilter is given, facts from other submissions are skipped.
 */
export async function loadFacts(path: string, adshFilter?: ReadonlySet<string>): Promise<Fact[]> {
  const facts: Fact[] = [];
  await readTsv(path, FACT_COLUMNS, row => {
    const adsh = row.get('adsh');
    if (adshFilter && !adshFilter.has(adsh)) return;
    facts.push({
      adsh,
      tag: row.get('tag'),
      version: row.get('version'),
      ddate: row.get('ddate'),
      qtrs: parseOptionalInt(row.get('qtrs')) ?? -1,
      uom: row.get('uom'),
      coreg: emptyToNull(row.get('coreg')),
      value: parseOptionalFloat(row.get('value')),
      footnote: emptyToNull(row.get('footnote')),
    });
  });
  return facts;
}

export interface CompanySelection {
  submissions: Submission[];
  /** 10-Q filings for the requested period, before dedup by company name */
  filing_count: number;
  /** After dedup by company name */
  company_count: number;
}

/**
 * Keep 10-Q filings for one fiscal year and period, one per company name.
 * Filings are stably sorted by name and the first per name is kept.
 */
export function selectCompanySubmissions(submissions: Submission[], year: number, quarter: string): CompanySelection {
  const filings = submissions
    .filter(s => s.form === QUARTERLY_FORM && s.fy === year && s.fp === quarter)
    .sort((a, b) => (a.name === b.name ? 0 : a.name < b.name ? -1 : 1));

  const seen = new Set<string>();
  const deduped: Submission[] = [];
  for (const sub of filings) {
    if (seen.has(sub.name)) continue;
    seen.add(sub.name);
    deduped.push(sub);
  }

  return { submissions: deduped, filing_count: filings.length, company_count: deduped.length };
}

export interface CompanyDataParams {
  dataDir: string;
  year: number;
  quarter: string;
}

/** Read sub.txt from a dataset directory and select the filing cohort */
export async function loadCompanyData(params: CompanyDataParams): Promise<CompanySelection> {
  const submissions = await loadSubmissions(join(params.dataDir, SUBMISSIONS_FILE));
  return selectCompanySubmissions(submissions, params.year, params.quarter);
}

/** Read num.txt facts belonging to the given submissions */
export async function loadCompanyFacts(dataDir: string, submissions: Submission[]): Promise<Fact[]> {
  const adshFilter = new Set(submissions.map(s => s.adsh));
  return loadFacts(join(dataDir, FACTS_FILE), adshFilter);
}
