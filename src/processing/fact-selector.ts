import { REPORTING_UNIT } from '../core/config.js';
import type { CompanyFact, Fact, Submission } from '../core/types.js';

/**
 * Fact Selector: narrows the long fact table to in-period, primary-filer,
 * currency-denominated facts for the requested tags, then keeps a single
 * fact per (company, tag).
 *
 * Dedup strategy: "shortest duration wins"
 * - Facts are stably sorted by (company name, tag, qtrs)
 * - The first fact per (company, tag) is kept, so an instant (qtrs 0) or
 *   single-quarter value beats the two-quarter year-to-date value
 */

/** Duration windows kept: instant, single quarter, two-quarter YTD */
export const ALLOWED_DURATIONS: ReadonlySet<number> = new Set([0, 1, 2]);

export interface SelectionResult {
  facts: CompanyFact[];
  input_count: number;
  filtered_count: number;
  output_count: number;
}

export interface SelectionOptions {
  unit?: string;
}

/**
 * Attach submission metadata to each fact by accession number.
 * Facts whose submission is not in the subset are discarded.
 */
export function joinCompanyFacts(submissions: Submission[], facts: Fact[]): CompanyFact[] {
  const byAdsh = new Map<string, Submission>();
  for (const sub of submissions) byAdsh.set(sub.adsh, sub);

  const joined: CompanyFact[] = [];
  for (const fact of facts) {
    const sub = byAdsh.get(fact.adsh);
    if (!sub) continue;
    joined.push({ ...fact, name: sub.name, period: sub.period, sic: sub.sic });
  }
  return joined;
}

/** True when a fact is eligible for the wide table */
export function isSelectableFact(fact: CompanyFact, tags: ReadonlySet<string>, unit: string = REPORTING_UNIT): boolean {
  return tags.has(fact.tag)
    && fact.ddate === fact.period
    && ALLOWED_DURATIONS.has(fact.qtrs)
    && (fact.coreg === null || fact.coreg === '')
    && fact.value !== null
    && !Number.isNaN(fact.value)
    && fact.uom === unit;
}

function compareFacts(a: CompanyFact, b: CompanyFact): number {
  if (a.name !== b.name) return a.name < b.name ? -1 : 1;
  if (a.tag !== b.tag) return a.tag < b.tag ? -1 : 1;
  return a.qtrs - b.qtrs;
}

/**
 * Filter and deduplicate company facts.
 * Output holds at most one fact per (company, tag), ordered by company then tag.
 */
export function selectFacts(
  facts: CompanyFact[],
  tags: Iterable<string>,
  options: SelectionOptions = {}
): SelectionResult {
  const tagSet = new Set(tags);
  const unit = options.unit ?? REPORTING_UNIT;

  const filtered = facts.filter(f => isSelectableFact(f, tagSet, unit));
  const sorted = [...filtered].sort(compareFacts);

  const seen = new Set<string>();
  const deduped: CompanyFact[] = [];
  for (const fact of sorted) {
    const key = `${fact.name}\u0000${fact.tag}`;
    if (seen.has(key)) continue;
    seen.add(key);
    deduped.push(fact);
  }

  return {
    facts: deduped,
    input_count: facts.length,
    filtered_count: filtered.length,
    output_count: deduped.length,
  };
}
