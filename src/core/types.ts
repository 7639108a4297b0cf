/**
 * Core data model for filing-ratios.
 *
 * Design principles:
 * - Facts and Submissions are read-only inputs for a single run
 * - Derived columns are computed per run, never written back
 * - Each company row is derived independently of every other row
 */

/** One quarterly filing from sub.txt */
export interface Submission {
  adsh: string;
  name: string;
  sic: number | null;
  countryba: string;
  form: string;
  fye: string;
  period: string;
  fy: number | null;
  fp: string;
  detail: string;
  instance: string;
}

/** One reported line item from num.txt */
export interface Fact {
  adsh: string;
  tag: string;
  version: string;
  ddate: string;
  qtrs: number;
  uom: string;
  coreg: string | null;
  value: number | null;
  footnote: string | null;
}

/** A fact joined with the submission it was filed in */
export interface CompanyFact extends Fact {
  name: string;
  period: string;
  sic: number | null;
}

/** Row of the SEC SIC code table */
export interface SicCode {
  sicCode: number;
  office: string;
  industryTitle: string;
}

export type ConceptId =
  | 'revenue'
  | 'net_income'
  | 'fixed_assets'
  | 'current_assets'
  | 'current_liabilities'
  | 'long_term_debt'
  | 'cogs'
  | 'inventory'
  | 'accounts_receivable'
  | 'cash'
  | 'marketable_securities'
  | 'accounts_payable'
  | 'short_term_debt'
  | 'accrued_liabilities'
  | 'balance_sheet';

/** Canonical columns filled from a concept's tag priority list */
export type ConceptColumn =
  | 'Revenue_'
  | 'NetIncome_'
  | 'FixedAssets_'
  | 'CurrentAssets_'
  | 'CurrentLiabilities_'
  | 'LTDebt_'
  | 'COGS_'
  | 'Inventory_'
  | 'AccountsReceivable_'
  | 'Cash_'
  | 'MarketableSec_'
  | 'AccountsPayable_'
  | 'STDebt_'
  | 'AccruedLiabilities_';

/** Canonical columns derived from the balance sheet identity */
export type IdentityColumn = 'Assets_' | 'Liabilities_' | 'Equity_';

export type CanonicalColumn = ConceptColumn | IdentityColumn;

export type CanonicalValues = Record<CanonicalColumn, number>;

export interface ConceptDefinition {
  id: ConceptId;
  display_name: string;
  description: string;
  /** null for concepts that only select tags (balance sheet totals) */
  column: ConceptColumn | null;
  /** Ordered by preference: first present tag wins */
  tags: string[];
}

/** (canonical column, ordered tags) pair consumed by the priority resolver */
export type ConceptColumnPair = readonly [ConceptColumn, readonly string[]];

export type RatioId =
  | 'ROE_'
  | 'ROA_'
  | 'ProfitMargin_'
  | 'EquityMultiplier_'
  | 'FixedAssetsToNetWorth_'
  | 'DebtToNetWorth_'
  | 'AssetTurnover_'
  | 'InventoryTurnover_'
  | 'DaysReceivables_'
  | 'QuickRatio_';

export type RatioValues = Record<RatioId, number>;

/** Pivoted row: one company, one cell per tag; null marks "no value" */
export interface WideRow {
  company: string;
  values: Record<string, number | null>;
}

export interface WideTable {
  /** Sorted distinct tag columns */
  tags: string[];
  /** Sorted by company name */
  rows: WideRow[];
}

/** Row after the accounting identity backfill; raw values are zero-filled */
export interface BalanceSheetRow {
  company: string;
  values: Record<string, number>;
  identity: Record<IdentityColumn, number>;
}

export interface FeatureRow {
  company: string;
  values: Record<string, number>;
  canonical: CanonicalValues;
  ratios: RatioValues;
}

/** Companion table of ln(0.01 + x) transformed columns */
export interface LogFeatureRow {
  company: string;
  features: Record<IdentityColumn | RatioId, number>;
}
