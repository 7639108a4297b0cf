import { describe, it, expect } from 'vitest';
import { mkdirSync, mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  loadCompanyData,
  loadCompanyFacts,
  loadFacts,
  loadSubmissions,
  selectCompanySubmissions,
} from '../src/core/dataset-loader.js';
import { SchemaMismatchError, SourceUnavailableError } from '../src/core/errors.js';
import { writeDataset } from './dataset-fixture.js';

describe('loadSubmissions', () => {
  it('parses typed fields from sub.txt', async () => {
    const dir = writeDataset([{ adsh: '0001', name: 'ALPHA CORP', sic: '2834' }], []);
    const [sub] = await loadSubmissions(join(dir, 'sub.txt'));
    expect(sub).toEqual({
      adsh: '0001',
      name: 'ALPHA CORP',
      sic: 2834,
      countryba: 'US',
      form: '10-Q',
      fye: '1231',
      period: '20190630',
      fy: 2019,
      fp: 'Q2',
      detail: '0',
      instance: '0001.xml',
    });
  });

  it('maps an empty SIC to null', async () => {
    const dir = writeDataset([{ adsh: '0001', name: 'ALPHA CORP', sic: '' }], []);
    const [sub] = await loadSubmissions(join(dir, 'sub.txt'));
    expect(sub?.sic).toBeNull();
  });

  it('throws SourceUnavailableError when the file is missing', async () => {
    await expect(loadSubmissions('/nonexistent/sub.txt')).rejects.toThrow(SourceUnavailableError);
  });

  it('throws SchemaMismatchError naming missing columns', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'fsds-'));
    const path = join(dir, 'sub.txt');
    writeFileSync(path, 'adsh\tname\tform\n0001\tALPHA\t10-Q\n');
    const err = await loadSubmissions(path).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SchemaMismatchError);
    if (err instanceof SchemaMismatchError) {
      expect(err.missingColumns).toEqual(['sic', 'countryba', 'fye', 'period', 'fy', 'fp', 'detail', 'instance']);
    }
  });

  it('throws SourceUnavailableError when the file cannot be read', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'fsds-'));
    const path = join(dir, 'sub.txt');
    mkdirSync(path);
    const err = await loadSubmissions(path).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SourceUnavailableError);
    if (err instanceof SourceUnavailableError) expect(err.source).toBe(path);
  });

  it('throws SchemaMismatchError for an empty file', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'fsds-'));
    const path = join(dir, 'sub.txt');
    writeFileSync(path, '');
    await expect(loadSubmissions(path)).rejects.toThrow(SchemaMismatchError);
  });
});

describe('loadFacts', () => {
  it('parses values and maps empty fields to null', async () => {
    const dir = writeDataset([], [
      { adsh: '0001', tag: 'Assets', value: '1500.5', qtrs: '0' },
      { adsh: '0001', tag: 'Revenues', value: '', qtrs: '1', coreg: 'SubCo' },
    ]);
    const facts = await loadFacts(join(dir, 'num.txt'));
    expect(facts).toHaveLength(2);
    expect(facts[0]).toMatchObject({ tag: 'Assets', value: 1500.5, qtrs: 0, coreg: null, footnote: null });
    expect(facts[1]).toMatchObject({ tag: 'Revenues', value: null, qtrs: 1, coreg: 'SubCo' });
  });

  it('skips facts outside the accession filter', async () => {
    const dir = writeDataset([], [
      { adsh: '0001', tag: 'Assets', value: '1' },
      { adsh: '0002', tag: 'Assets', value: '2' },
    ]);
    const facts = await loadFacts(join(dir, 'num.txt'), new Set(['0002']));
    expect(facts.map(f => f.value)).toEqual([2]);
  });
});

describe('selectCompanySubmissions', () => {
  it('keeps 10-Q filings for the requested fiscal year and period', async () => {
    const dir = writeDataset([
      { adsh: '0001', name: 'ALPHA CORP' },
      { adsh: '0002', name: 'BETA INC', form: '10-K' },
      { adsh: '0003', name: 'GAMMA LLC', fp: 'Q3' },
      { adsh: '0004', name: 'DELTA CO', fy: '2018' },
    ], []);
    const subs = await loadSubmissions(join(dir, 'sub.txt'));
    const selection = selectCompanySubmissions(subs, 2019, 'Q2');
    expect(selection.submissions.map(s => s.name)).toEqual(['ALPHA CORP']);
  });

  it('keeps the first filing per company name', async () => {
    const dir = writeDataset([
      { adsh: '0002', name: 'BETA INC' },
      { adsh: '0001', name: 'ALPHA CORP' },
      { adsh: '0003', name: 'BETA INC' },
    ], []);
    const subs = await loadSubmissions(join(dir, 'sub.txt'));
    const selection = selectCompanySubmissions(subs, 2019, 'Q2');
    expect(selection.filing_count).toBe(3);
    expect(selection.company_count).toBe(2);
    expect(selection.submissions.map(s => s.adsh)).toEqual(['0001', '0002']);
  });
});

describe('loadCompanyData / loadCompanyFacts', () => {
  it('reads the cohort and only its facts', async () => {
    const dir = writeDataset(
      [{ adsh: '0001', name: 'ALPHA CORP' }, { adsh: '0002', name: 'BETA INC', fp: 'Q1' }],
      [{ adsh: '0001', tag: 'Assets', value: '10' }, { adsh: '0002', tag: 'Assets', value: '20' }]
    );
    const selection = await loadCompanyData({ dataDir: dir, year: 2019, quarter: 'Q2' });
    const facts = await loadCompanyFacts(dir, selection.submissions);
    expect(selection.company_count).toBe(1);
    expect(facts.map(f => f.adsh)).toEqual(['0001']);
  });
});
