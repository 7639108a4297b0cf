import { cellValue } from './wide-reshaper.js';
import type { BalanceSheetRow, WideRow } from '../core/types.js';

/**
 * Accounting-identity backfill: Assets = Liabilities + Equity.
 *
 * Evaluated once per row, in order:
 * 1. Assets_ is the reported Assets, else 0
 * 2. Liabilities_ is the reported Liabilities, else
 *    LiabilitiesAndStockholdersEquity - StockholdersEquity
 * 3. If still unknown and LiabilitiesAndStockholdersEquity equals Assets_,
 *    Liabilities_ is 0
 * 4. Otherwise the row is dropped
 * 5. Equity_ is the reported StockholdersEquity, else Assets_ - Liabilities_
 * 6. Every other missing cell becomes 0
 */

export interface BackfillResult {
  rows: BalanceSheetRow[];
  /** Companies excluded because Liabilities_ could not be resolved */
  dropped: string[];
}

/** Returns null when the row cannot satisfy the identity and must be excluded */
export function backfillIdentity(row: WideRow): BalanceSheetRow | null {
  const assets = cellValue(row.values, 'Assets');
  const liabilities = cellValue(row.values, 'Liabilities');
  const totalLiabilitiesAndEquity = cellValue(row.values, 'LiabilitiesAndStockholdersEquity');
  const equity = cellValue(row.values, 'StockholdersEquity');

  const assetsResolved = assets ?? 0;

  let liabilitiesResolved: number | null = liabilities;
  if (liabilitiesResolved === null && totalLiabilitiesAndEquity !== null && equity !== null) {
    liabilitiesResolved = totalLiabilitiesAndEquity - equity;
  }
  if (liabilitiesResolved === null && totalLiabilitiesAndEquity !== null
    && totalLiabilitiesAndEquity - assetsResolved === 0) {
    liabilitiesResolved = 0;
  }
  if (liabilitiesResolved === null) return null;

  const equityResolved = equity ?? assetsResolved - liabilitiesResolved;

  const values: Record<string, number> = {};
  for (const tag of Object.keys(row.values)) {
    values[tag] = cellValue(row.values, tag) ?? 0;
  }

  return {
    company: row.company,
    values,
    identity: {
      Assets_: assetsResolved,
      Liabilities_: liabilitiesResolved,
      Equity_: equityResolved,
    },
  };
}

export function backfillTable(rows: WideRow[]): BackfillResult {
  const retained: BalanceSheetRow[] = [];
  const dropped: string[] = [];

  for (const row of rows) {
    const filled = backfillIdentity(row);
    if (filled) retained.push(filled);
    else dropped.push(row.company);
  }

  return { rows: retained, dropped };
}
