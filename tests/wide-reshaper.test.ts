import { describe, it, expect } from 'vitest';
import { pivotFacts, cellValue } from '../src/processing/wide-reshaper.js';
import { StructuralViolationError } from '../src/core/errors.js';
import type { CompanyFact } from '../src/core/types.js';

function fact(name: string, tag: string, value: number): CompanyFact {
  return {
    adsh: `adsh-${name}`,
    tag,
    version: 'us-gaap/2019',
    ddate: '20190630',
    qtrs: 0,
    uom: 'USD',
    coreg: null,
    value,
    footnote: null,
    name,
    period: '20190630',
    sic: null,
  };
}

describe('pivotFacts', () => {
  it('produces one row per company and one column per tag', () => {
    const table = pivotFacts([
      fact('Beta Inc', 'Assets', 50),
      fact('Alpha Corp', 'Assets', 100),
      fact('Alpha Corp', 'Revenues', 40),
    ]);
    expect(table.tags).toEqual(['Assets', 'Revenues']);
    expect(table.rows).toEqual([
      { company: 'Alpha Corp', values: { Assets: 100, Revenues: 40 } },
      { company: 'Beta Inc', values: { Assets: 50, Revenues: null } },
    ]);
  });

  it('leaves unreported cells null, not zero', () => {
    const table = pivotFacts([fact('Alpha Corp', 'Assets', 0), fact('Beta Inc', 'Revenues', 5)]);
    expect(table.rows[0]?.values).toEqual({ Assets: 0, Revenues: null });
  });

  it('returns an empty table for no facts', () => {
    expect(pivotFacts([])).toEqual({ tags: [], rows: [] });
  });

  it('throws StructuralViolationError on duplicate (company, tag)', () => {
    const facts = [fact('Alpha Corp', 'Assets', 100), fact('Alpha Corp', 'Assets', 101)];
    expect(() => pivotFacts(facts)).toThrow(StructuralViolationError);
    expect(() => pivotFacts(facts)).toThrow('Cannot pivot facts: Alpha Corp has 2 values for tag Assets.');
  });
});

describe('cellValue', () => {
  it('treats absent columns and NaN as missing', () => {
    const values = { Assets: 10, Liabilities: null, Equity: Number.NaN };
    expect(cellValue(values, 'Assets')).toBe(10);
    expect(cellValue(values, 'Liabilities')).toBeNull();
    expect(cellValue(values, 'Equity')).toBeNull();
    expect(cellValue(values, 'Revenues')).toBeNull();
  });
});
