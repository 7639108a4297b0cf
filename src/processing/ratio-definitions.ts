import type { CanonicalValues, RatioId } from '../core/types.js';

/**
 * Derived financial ratio definitions.
 *
 * Each ratio is computed from canonical columns of a single company row.
 * Results may be non-finite (zero denominators); the ratio engine applies
 * the degenerate value policy after each computation.
 */

export interface RatioDefinition {
  id: RatioId;
  display_name: string;
  description: string;
  formula: string;
  format: 'percentage' | 'multiple' | 'days';
  compute: (c: CanonicalValues) => number;
}

const DAYS_PER_YEAR = 365;

export const RATIO_DEFINITIONS: RatioDefinition[] = [
  {
    id: 'ROE_',
    display_name: 'Return on Equity',
    description: 'Net income relative to shareholders equity',
    formula: 'NetIncome_ / Equity_',
    format: 'percentage',
    compute: c => c.NetIncome_ / c.Equity_,
  },
  {
    id: 'ROA_',
    display_name: 'Return on Assets',
    description: 'Net income relative to total assets',
    formula: 'NetIncome_ / Assets_',
    format: 'percentage',
    compute: c => c.NetIncome_ / c.Assets_,
  },
  {
    id: 'ProfitMargin_',
    display_name: 'Profit Margin',
    description: 'Net income as a share of revenue',
    formula: 'NetIncome_ / Revenue_',
    format: 'percentage',
    compute: c => c.NetIncome_ / c.Revenue_,
  },
  {
    id: 'EquityMultiplier_',
    display_name: 'Equity Multiplier',
    description: 'Total assets per unit of equity',
    formula: 'Assets_ / Equity_',
    format: 'multiple',
    compute: c => c.Assets_ / c.Equity_,
  },
  {
    id: 'FixedAssetsToNetWorth_',
    display_name: 'Fixed Assets to Net Worth',
    description: 'Non-current assets relative to equity',
    formula: '(Assets_ - CurrentAssets_) / Equity_',
    format: 'multiple',
    compute: c => (c.Assets_ - c.CurrentAssets_) / c.Equity_,
  },
  {
    id: 'DebtToNetWorth_',
    display_name: 'Debt to Net Worth',
    description: 'Long- and short-term debt relative to equity',
    formula: '(LTDebt_ + STDebt_) / Equity_',
    format: 'multiple',
    compute: c => (c.LTDebt_ + c.STDebt_) / c.Equity_,
  },
  {
    id: 'AssetTurnover_',
    display_name: 'Asset Turnover',
    description: 'Revenue generated per unit of assets',
    formula: 'Revenue_ / Assets_',
    format: 'multiple',
    compute: c => c.Revenue_ / c.Assets_,
  },
  {
    id: 'InventoryTurnover_',
    display_name: 'Inventory Turnover',
    description: 'Cost of goods sold relative to inventory',
    formula: 'COGS_ / Inventory_',
    format: 'multiple',
    compute: c => c.COGS_ / c.Inventory_,
  },
  {
    id: 'DaysReceivables_',
    display_name: 'Days Receivables',
    description: 'Days of revenue outstanding in receivables',
    formula: '365 / (Revenue_ / AccountsReceivable_)',
    format: 'days',
    compute: c => DAYS_PER_YEAR / (c.Revenue_ / c.AccountsReceivable_),
  },
  {
    // Keeps the 365-day scaling it has always been published with; this is
    // not the textbook quick ratio.
    id: 'QuickRatio_',
    display_name: 'Quick Ratio',
    description: 'Days of quick liabilities covered by cash, marketable securities and receivables',
    formula: '365 / ((Cash_ + MarketableSec_ + AccountsReceivable_) / (STDebt_ + AccountsPayable_ + AccruedLiabilities_))',
    format: 'days',
    compute: c => {
      const quickAssets = c.Cash_ + c.MarketableSec_ + c.AccountsReceivable_;
      const quickLiabilities = c.STDebt_ + c.AccountsPayable_ + c.AccruedLiabilities_;
      return DAYS_PER_YEAR / (quickAssets / quickLiabilities);
    },
  },
];

export function getRatioDefinition(id: string): RatioDefinition | undefined {
  return RATIO_DEFINITIONS.find(r => r.id === id);
}

export function findRatioByName(name: string): RatioDefinition | undefined {
  const lower = name.trim().toLowerCase();

  const byId = RATIO_DEFINITIONS.find(r => r.id.toLowerCase() === lower || r.id.toLowerCase() === `${lower}_`);
  if (byId) return byId;

  const byName = RATIO_DEFINITIONS.find(r => r.display_name.toLowerCase() === lower);
  if (byName) return byName;

  const keywords: Record<string, RatioId> = {
    'return on equity': 'ROE_',
    'return on assets': 'ROA_',
    'net margin': 'ProfitMargin_',
    'margin': 'ProfitMargin_',
    'leverage': 'EquityMultiplier_',
    'debt to equity': 'DebtToNetWorth_',
    'd/e': 'DebtToNetWorth_',
    'turnover': 'AssetTurnover_',
    'inventory': 'InventoryTurnover_',
    'dso': 'DaysReceivables_',
    'receivable days': 'DaysReceivables_',
    'acid test': 'QuickRatio_',
  };

  const sortedKeywords = Object.entries(keywords).sort((a, b) => b[0].length - a[0].length);
  for (const [keyword, ratioId] of sortedKeywords) {
    if (lower.includes(keyword)) {
      return RATIO_DEFINITIONS.find(r => r.id === ratioId);
    }
  }

  return undefined;
}
