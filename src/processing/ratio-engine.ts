import { backfillTable } from './identity-backfill.js';
import { fillInPriority } from './priority-resolver.js';
import { RATIO_DEFINITIONS, type RatioDefinition } from './ratio-definitions.js';
import type {
  CanonicalValues,
  ConceptColumnPair,
  FeatureRow,
  IdentityColumn,
  LogFeatureRow,
  RatioId,
  RatioValues,
  WideTable,
} from '../core/types.js';

/**
 * Replaces a ratio result before it is stored.
 * Applied to every ratio immediately after computing it.
 */
export type DegenerateValuePolicy = (value: number, ratio: RatioDefinition) => number;

/** Non-finite results (x/0, 0/0, infinities) become defaultValue */
export function replaceNonFinite(defaultValue: number = 0): DegenerateValuePolicy {
  return value => (Number.isFinite(value) ? value : defaultValue);
}

export const DEFAULT_DEGENERATE_POLICY: DegenerateValuePolicy = replaceNonFinite(0);

export interface RatioOptions {
  policy?: DegenerateValuePolicy;
  ratios?: RatioDefinition[];
}

export interface RatioTableResult {
  rows: FeatureRow[];
  /** Companies removed because the balance sheet identity could not be resolved */
  dropped: string[];
}

export function computeRatios(
  canonical: CanonicalValues,
  policy: DegenerateValuePolicy = DEFAULT_DEGENERATE_POLICY,
  ratios: RatioDefinition[] = RATIO_DEFINITIONS
): RatioValues {
  const values: RatioValues = {
    ROE_: 0,
    ROA_: 0,
    ProfitMargin_: 0,
    EquityMultiplier_: 0,
    FixedAssetsToNetWorth_: 0,
    DebtToNetWorth_: 0,
    AssetTurnover_: 0,
    InventoryTurnover_: 0,
    DaysReceivables_: 0,
    QuickRatio_: 0,
  };
  for (const ratio of ratios) {
    values[ratio.id] = policy(ratio.compute(canonical), ratio);
  }
  return values;
}

/**
 * Backfill the balance sheet identity, resolve canonical concepts and
 * derive the ratio battery for every company in a wide table.
 */
export function calculateRatios(
  table: WideTable,
  pairs: readonly ConceptColumnPair[],
  options: RatioOptions = {}
): RatioTableResult {
  const policy = options.policy ?? DEFAULT_DEGENERATE_POLICY;
  const ratios = options.ratios ?? RATIO_DEFINITIONS;

  const { rows: balanced, dropped } = backfillTable(table.rows);

  const rows = balanced.map((row): FeatureRow => {
    const canonical: CanonicalValues = {
      ...row.identity,
      ...fillInPriority(row.values, pairs),
    };
    return {
      company: row.company,
      values: row.values,
      canonical,
      ratios: computeRatios(canonical, policy, ratios),
    };
  });

  return { rows, dropped };
}

export const LOG_FEATURE_COLUMNS: readonly (IdentityColumn | RatioId)[] = [
  'Assets_', 'Liabilities_', 'Equity_', 'ROE_', 'ROA_', 'ProfitMargin_',
  'EquityMultiplier_', 'FixedAssetsToNetWorth_', 'DebtToNetWorth_',
  'AssetTurnover_', 'InventoryTurnover_', 'DaysReceivables_', 'QuickRatio_',
];

const LOG_OFFSET = 0.01;

/** ln(0.01 + x); values where the log is undefined become 0 */
export function logTransform(value: number): number {
  const logged = Math.log(LOG_OFFSET + value);
  return Number.isFinite(logged) ? logged : 0;
}

/**
 * Companion table of log-scaled features, transformed element-wise per
 * column and per row.
 */
export function logFeatures(rows: FeatureRow[]): LogFeatureRow[] {
  return rows.map(row => {
    const source: Record<IdentityColumn | RatioId, number> = {
      Assets_: row.canonical.Assets_,
      Liabilities_: row.canonical.Liabilities_,
      Equity_: row.canonical.Equity_,
      ...row.ratios,
    };
    const features = { ...source };
    for (const column of LOG_FEATURE_COLUMNS) {
      features[column] = logTransform(source[column]);
    }
    return { company: row.company, features };
  });
}
