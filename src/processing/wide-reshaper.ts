import { StructuralViolationError } from '../core/errors.js';
import type { CompanyFact, WideRow, WideTable } from '../core/types.js';

/**
 * Pivot a deduplicated long fact table into one row per company and one
 * column per tag. Cells a company did not report hold null, never zero.
 *
 * Throws StructuralViolationError when a (company, tag) pair carries more
 * than one fact; selectFacts() guarantees this never happens.
 */
export function pivotFacts(facts: CompanyFact[]): WideTable {
  const byCompany = new Map<string, Map<string, number>>();
  const counts = new Map<string, number>();
  const tagSet = new Set<string>();

  for (const fact of facts) {
    if (fact.value === null) continue;

    const key = `${fact.name}\u0000${fact.tag}`;
    counts.set(key, (counts.get(key) ?? 0) + 1);

    let cells = byCompany.get(fact.name);
    if (!cells) {
      cells = new Map();
      byCompany.set(fact.name, cells);
    }
    cells.set(fact.tag, fact.value);
    tagSet.add(fact.tag);
  }

  for (const [key, count] of counts) {
    if (count > 1) {
      const [company, tag] = key.split('\u0000');
      throw new StructuralViolationError(company, tag, count);
    }
  }

  const tags = Array.from(tagSet).sort();
  const companies = Array.from(byCompany.keys()).sort();

  const rows: WideRow[] = companies.map(company => {
    const cells = byCompany.get(company) ?? new Map<string, number>();
    const values: Record<string, number | null> = {};
    for (const tag of tags) {
      values[tag] = cells.get(tag) ?? null;
    }
    return { company, values };
  });

  return { tags, rows };
}

/** Read a cell, treating columns the table never saw as missing */
export function cellValue(values: Record<string, number | null>, tag: string): number | null {
  const value: number | null | undefined = values[tag];
  return value === undefined || value === null || Number.isNaN(value) ? null : value;
}
