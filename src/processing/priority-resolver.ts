import { cellValue } from './wide-reshaper.js';
import type { ConceptColumn, ConceptColumnPair } from '../core/types.js';

/**
 * Priority fill-in: collapse a concept's alternative tags into one canonical
 * value per company.
 *
 * The first tag in the list with a present value wins and is never
 * overwritten by a later tag. Zero is the absent sentinel: cells have been
 * zero-filled by the identity backfill, so a reported 0 falls through to the
 * next tag. With no present tag the canonical value is 0.
 */

export const ALL_CONCEPT_COLUMNS: readonly ConceptColumn[] = [
  'Revenue_', 'NetIncome_', 'FixedAssets_', 'CurrentAssets_', 'CurrentLiabilities_',
  'LTDebt_', 'COGS_', 'Inventory_', 'AccountsReceivable_', 'Cash_',
  'MarketableSec_', 'AccountsPayable_', 'STDebt_', 'AccruedLiabilities_',
];

export function emptyConceptValues(): Record<ConceptColumn, number> {
  return {
    Revenue_: 0,
    NetIncome_: 0,
    FixedAssets_: 0,
    CurrentAssets_: 0,
    CurrentLiabilities_: 0,
    LTDebt_: 0,
    COGS_: 0,
    Inventory_: 0,
    AccountsReceivable_: 0,
    Cash_: 0,
    MarketableSec_: 0,
    AccountsPayable_: 0,
    STDebt_: 0,
    AccruedLiabilities_: 0,
  };
}

export function resolveConcept(values: Record<string, number | null>, tags: readonly string[]): number {
  for (const tag of tags) {
    const value = cellValue(values, tag);
    if (value !== null && value !== 0) return value;
  }
  return 0;
}

/**
 * Resolve every (column, tags) pair for one row.
 * Columns not named by any pair are 0.
 */
export function fillInPriority(
  values: Record<string, number | null>,
  pairs: readonly ConceptColumnPair[]
): Record<ConceptColumn, number> {
  const resolved = emptyConceptValues();

  for (const [column, tags] of pairs) {
    resolved[column] = resolveConcept(values, tags);
  }
  return resolved;
}
