import * as cheerio from 'cheerio';
import { SIC_CODES_URL, USER_AGENT } from './config.js';
import { SchemaMismatchError, SourceUnavailableError } from './errors.js';
import type { SicCode, Submission } from './types.js';

/**
 * SEC Standard Industrial Classification code table.
 *
 * Scraped from the EDGAR SIC code page: a single HTML table with class
 * "sic" and columns SIC Code, Office, Industry Title. One request, no
 * retries; any failure aborts the lookup.
 */

const SIC_COLUMN = 'SIC Code';
const OFFICE_COLUMN = 'Office';
const TITLE_COLUMN = 'Industry Title';

/** Parse the SIC code page. Any row without an integer code fails the whole table. */
export function parseSicTable(html: string, source: string = SIC_CODES_URL): SicCode[] {
  const $ = cheerio.load(html);
  const table = $('.sic').first();
  if (table.length === 0) {
    throw new SchemaMismatchError('SIC code page has no table with class "sic"', source, [SIC_COLUMN]);
  }

  const grid: string[][] = [];
  table.find('tr').each((_, tr) => {
    const cells = $(tr).find('th, td').toArray().map(cell => $(cell).text().trim());
    grid.push(cells);
  });

  const [header, ...body] = grid;
  if (!header) {
    throw new SchemaMismatchError('SIC code table is empty', source, [SIC_COLUMN, OFFICE_COLUMN, TITLE_COLUMN]);
  }

  const codeIdx = header.indexOf(SIC_COLUMN);
  const officeIdx = header.indexOf(OFFICE_COLUMN);
  const titleIdx = header.indexOf(TITLE_COLUMN);
  const missing = [
    codeIdx < 0 ? SIC_COLUMN : null,
    officeIdx < 0 ? OFFICE_COLUMN : null,
    titleIdx < 0 ? TITLE_COLUMN : null,
  ].filter((c): c is string => c !== null);
  if (missing.length > 0) {
    throw new SchemaMismatchError(`SIC code table is missing columns: ${missing.join(', ')}`, source, missing);
  }

  const codes: SicCode[] = [];
  for (const row of body) {
    const cell = row[codeIdx] ?? '';
    if (!/^\d+$/.test(cell)) {
      throw new SchemaMismatchError(`SIC code table has a non-integer SIC Code: "${cell}"`, source, [SIC_COLUMN]);
    }
    const sicCode = parseInt(cell, 10);
    codes.push({
      sicCode,
      office: (row[officeIdx] ?? '').replace('Office of', '').trim(),
      industryTitle: row[titleIdx] ?? '',
    });
  }
  return codes;
}

/** Fetch and parse the SIC code table */
export async function fetchSicCodes(url: string = SIC_CODES_URL): Promise<SicCode[]> {
  let response: Response;
  try {
    response = await fetch(url, {
      headers: {
        'User-Agent': USER_AGENT,
        'Accept': 'text/html',
      },
    });
  } catch (err) {
    throw new SourceUnavailableError(
      `Network error fetching ${url}: ${err instanceof Error ? err.message : String(err)}`,
      url
    );
  }

  if (response.status === 403) {
    throw new SourceUnavailableError(
      'SEC rejected request (403 Forbidden). Check your SEC_USER_AGENT environment variable: SEC requires a valid User-Agent with contact info.',
      url,
      403
    );
  }

  if (!response.ok) {
    throw new SourceUnavailableError(
      `SIC code request failed: ${response.status} ${response.statusText}`,
      url,
      response.status
    );
  }

  return parseSicTable(await response.text(), url);
}

export interface CompanyIndustry {
  company: string;
  sic: number | null;
  industryTitle: string | null;
  office: string | null;
}

/** Describe each company by the SIC code of its retained submission */
export function joinIndustry(
  companies: string[],
  submissions: Submission[],
  sicCodes: SicCode[]
): Map<string, CompanyIndustry> {
  const codeMap = new Map<number, SicCode>();
  for (const code of sicCodes) codeMap.set(code.sicCode, code);

  const subByName = new Map<string, Submission>();
  for (const sub of submissions) {
    if (!subByName.has(sub.name)) subByName.set(sub.name, sub);
  }

  const result = new Map<string, CompanyIndustry>();
  for (const company of companies) {
    const sic = subByName.get(company)?.sic ?? null;
    const code = sic !== null ? codeMap.get(sic) : undefined;
    result.set(company, {
      company,
      sic,
      industryTitle: code?.industryTitle ?? null,
      office: code?.office ?? null,
    });
  }
  return result;
}
