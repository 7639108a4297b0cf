import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import { SchemaMismatchError, SourceUnavailableError } from '../core/errors.js';
import type { ConceptColumnPair, ConceptDefinition } from '../core/types.js';

/**
 * Canonical financial concepts and the XBRL tags that report them.
 *
 * Filers report the same economic quantity under different tags, so each
 * concept carries an ordered tag list: the first tag a company reports
 * wins. Tags are ordered by how often they appear in 10-Q filings.
 *
 * The mapping lives in data/concepts.json so tags can be added without
 * touching pipeline code. A tag may appear under several concepts; each
 * concept resolves it independently.
 */

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// src/processing/ → ../../data, dist/processing/ → ../../data
export const DEFAULT_CONCEPTS_PATH = join(__dirname, '..', '..', 'data', 'concepts.json');

const conceptSchema = z.object({
  id: z.enum([
    'revenue', 'net_income', 'fixed_assets', 'current_assets', 'current_liabilities',
    'long_term_debt', 'cogs', 'inventory', 'accounts_receivable', 'cash',
    'marketable_securities', 'accounts_payable', 'short_term_debt', 'accrued_liabilities',
    'balance_sheet',
  ]),
  display_name: z.string().min(1),
  description: z.string(),
  column: z.enum([
    'Revenue_', 'NetIncome_', 'FixedAssets_', 'CurrentAssets_', 'CurrentLiabilities_',
    'LTDebt_', 'COGS_', 'Inventory_', 'AccountsReceivable_', 'Cash_',
    'MarketableSec_', 'AccountsPayable_', 'STDebt_', 'AccruedLiabilities_',
  ]).nullable(),
  tags: z.array(z.string().min(1)).min(1),
});

const mappingSchema = z.object({
  version: z.number().int(),
  concepts: z.array(conceptSchema).min(1),
}).superRefine((mapping, ctx) => {
  const ids = new Set<string>();
  const columns = new Set<string>();
  for (const concept of mapping.concepts) {
    if (ids.has(concept.id)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate concept id: ${concept.id}` });
    }
    ids.add(concept.id);
    if (concept.column !== null) {
      if (columns.has(concept.column)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate concept column: ${concept.column}` });
      }
      columns.add(concept.column);
    }
  }
});

/** Validate an already-parsed mapping document */
export function parseConceptDefinitions(raw: unknown, source: string = 'inline'): ConceptDefinition[] {
  const parsed = mappingSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(i => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
      .join('; ');
    throw new SchemaMismatchError(`Invalid concept mapping in ${source}: ${issues}`, source);
  }
  return parsed.data.concepts;
}

/** Read and validate a concept mapping file */
export function loadConceptDefinitions(path: string = DEFAULT_CONCEPTS_PATH): ConceptDefinition[] {
  let body: string;
  try {
    body = readFileSync(path, 'utf8');
  } catch (err) {
    throw new SourceUnavailableError(
      `Could not read concept mapping ${path}: ${err instanceof Error ? err.message : String(err)}`,
      path
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch {
    throw new SchemaMismatchError(`Concept mapping ${path} is not valid JSON`, path);
  }
  return parseConceptDefinitions(raw, path);
}

export const CONCEPT_DEFINITIONS: ConceptDefinition[] = loadConceptDefinitions();

/** Union of every tag across all concepts, duplicates removed */
export function collectAllTags(definitions: ConceptDefinition[] = CONCEPT_DEFINITIONS): string[] {
  const tags = new Set<string>();
  for (const concept of definitions) {
    for (const tag of concept.tags) tags.add(tag);
  }
  return Array.from(tags);
}

/** (column, tags) pairs for every concept that fills a canonical column */
export function canonicalColumnPairs(definitions: ConceptDefinition[] = CONCEPT_DEFINITIONS): ConceptColumnPair[] {
  const pairs: ConceptColumnPair[] = [];
  for (const concept of definitions) {
    if (concept.column !== null) pairs.push([concept.column, concept.tags]);
  }
  return pairs;
}

/** Lookup a concept by ID */
export function getConceptDefinition(
  id: string,
  definitions: ConceptDefinition[] = CONCEPT_DEFINITIONS
): ConceptDefinition | undefined {
  return definitions.find(c => c.id === id);
}

/** Lookup a concept by display name, column or keyword (case-insensitive) */
export function findConceptByName(
  name: string,
  definitions: ConceptDefinition[] = CONCEPT_DEFINITIONS
): ConceptDefinition | undefined {
  const lower = name.trim().toLowerCase();

  const byId = definitions.find(c => c.id === lower);
  if (byId) return byId;

  const byName = definitions.find(c => c.display_name.toLowerCase() === lower);
  if (byName) return byName;

  const byColumn = definitions.find(c => c.column !== null && c.column.toLowerCase() === lower);
  if (byColumn) return byColumn;

  const keywords: Record<string, string> = {
    'sales': 'revenue',
    'top line': 'revenue',
    'profit': 'net_income',
    'earnings': 'net_income',
    'bottom line': 'net_income',
    'noncurrent assets': 'fixed_assets',
    'ltd': 'long_term_debt',
    'long term debt': 'long_term_debt',
    'cost of sales': 'cogs',
    'receivables': 'accounts_receivable',
    'payables': 'accounts_payable',
    'short term debt': 'short_term_debt',
    'std': 'short_term_debt',
    'accruals': 'accrued_liabilities',
    'marketable': 'marketable_securities',
    'equity': 'balance_sheet',
    'assets': 'balance_sheet',
  };

  const sortedKeywords = Object.entries(keywords).sort((a, b) => b[0].length - a[0].length);
  for (const [keyword, conceptId] of sortedKeywords) {
    if (lower.includes(keyword)) {
      return definitions.find(c => c.id === conceptId);
    }
  }

  return undefined;
}
