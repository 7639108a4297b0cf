#!/usr/bin/env node

/**
 * MCP (Model Context Protocol) server entry point for filing-ratios.
 *
 * Exposes the ratio pipeline over stdio so MCP clients can compute
 * cross-sectional ratio tables from a local financial statement dataset.
 *
 * Tools:
 *   - compute_ratios: run the pipeline for one fiscal year and period
 *   - list_concepts: canonical concepts, their tag priority lists and the ratio formulas
 *   - get_sic_codes: the SEC SIC industry table
 *
 * Resources:
 *   - filing-ratios://concepts: the concept-to-tag mapping in use
 *
 * Prompts:
 *   - analyze_cohort: ratio-driven overview of one quarterly cohort
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { runRatioPipeline, classifyError } from './core/pipeline.js';
import { fetchSicCodes } from './core/sic-client.js';
import { DATA_DIR, DEFAULT_QUARTER, DEFAULT_YEAR } from './core/config.js';
import { CONCEPT_DEFINITIONS } from './processing/concept-definitions.js';
import { RATIO_DEFINITIONS } from './processing/ratio-definitions.js';
import { serializePipelineResult } from './output/json-renderer.js';
import { serializeConcepts, serializeRatioDefinitions, serializeSicCodes } from './web/serialization.js';

const server = new McpServer(
  { name: 'filing-ratios', version: '0.1.0' },
  { capabilities: { tools: {}, resources: {}, prompts: {} } }
);

// ── Tools ──────────────────────────────────────────────────────────────

server.tool(
  'compute_ratios',
  'Compute canonical balance sheet and income statement values plus ten financial ratios (ROE, ROA, profit margin, equity multiplier, fixed assets to net worth, debt to net worth, asset turnover, inventory turnover, days receivables, quick ratio) for every company that filed a 10-Q in the given fiscal year and period.',
  {
    year: z.number().int().min(2009).max(2100).optional().default(DEFAULT_YEAR).describe(`Fiscal year (default ${DEFAULT_YEAR})`),
    quarter: z.enum(['Q1', 'Q2', 'Q3', 'Q4']).optional().default(DEFAULT_QUARTER).describe(`Fiscal period (default ${DEFAULT_QUARTER})`),
    default_value: z.number().optional().default(0).describe('Value substituted for ratios that are not finite (default 0)'),
    log: z.boolean().optional().default(false).describe('Also return log-scaled features ln(0.01 + x)'),
    industry: z.boolean().optional().default(false).describe('Annotate companies with their SIC industry title'),
    limit: z.number().int().min(1).max(5000).optional().default(100).describe('Max companies to return (default 100)'),
  },
  async ({ year, quarter, default_value, log, industry, limit }) => {
    const outcome = await runRatioPipeline({
      dataDir: DATA_DIR,
      year,
      quarter,
      defaultValue: default_value,
      includeLog: log,
      includeIndustry: industry,
    });

    if (!outcome.success) {
      let errorText = outcome.error.message;
      if (outcome.error.missingColumns?.length) {
        errorText += `\n\nMissing columns: ${outcome.error.missingColumns.join(', ')}`;
      }
      return { content: [{ type: 'text', text: errorText }], isError: true };
    }

    const output = serializePipelineResult(outcome.result);
    const truncated = {
      ...output,
      companies: output.companies.slice(0, limit),
      ...(output.log_features ? { log_features: output.log_features.slice(0, limit) } : {}),
      total_companies: output.companies.length,
    };

    return { content: [{ type: 'text', text: JSON.stringify(truncated, null, 2) }] };
  }
);

server.tool(
  'list_concepts',
  'List the canonical financial concepts with their XBRL tag priority lists, and the ratio formulas built from them.',
  {},
  async () => {
    const output = {
      ...serializeConcepts(CONCEPT_DEFINITIONS),
      ...serializeRatioDefinitions(RATIO_DEFINITIONS),
    };
    return { content: [{ type: 'text', text: JSON.stringify(output, null, 2) }] };
  }
);

server.tool(
  'get_sic_codes',
  'Fetch the SEC Standard Industrial Classification table (SIC code, reviewing office, industry title).',
  {
    filter: z.string().optional().describe('Only return industries or offices containing this text'),
  },
  async ({ filter }) => {
    try {
      const codes = await fetchSicCodes();
      const needle = filter?.toLowerCase();
      const matching = needle
        ? codes.filter(c => c.industryTitle.toLowerCase().includes(needle) || c.office.toLowerCase().includes(needle))
        : codes;
      return { content: [{ type: 'text', text: JSON.stringify(serializeSicCodes(matching), null, 2) }] };
    } catch (err) {
      return { content: [{ type: 'text', text: classifyError(err).message }], isError: true };
    }
  }
);

// ── Resources ──────────────────────────────────────────────────────────

server.resource(
  'concepts',
  'filing-ratios://concepts',
  { description: 'Canonical concepts and the XBRL tags that feed them, in priority order', mimeType: 'application/json' },
  async (uri) => ({
    contents: [{
      uri: uri.href,
      mimeType: 'application/json',
      text: JSON.stringify(serializeConcepts(CONCEPT_DEFINITIONS), null, 2),
    }],
  })
);

// ── Prompts ────────────────────────────────────────────────────────────

server.prompt(
  'analyze_cohort',
  'Ratio-driven overview of the companies that filed a 10-Q in one fiscal period',
  {
    year: z.string().describe('Fiscal year (e.g., 2019)'),
    quarter: z.string().describe('Fiscal period (Q1-Q4)'),
  },
  async ({ year, quarter }) => ({
    messages: [{
      role: 'user' as const,
      content: {
        type: 'text' as const,
        text: `Analyze the FY${year} ${quarter} 10-Q cohort using the filing-ratios tools:

1. Call compute_ratios with year ${year} and quarter ${quarter}, industry enabled.
2. Report how many filings were read, how many companies remained after dedup and how many were dropped because their balance sheet identity could not be resolved.
3. Identify the companies with the highest and lowest ROE and debt to net worth.
4. Note any ratios that were replaced by the default value (zero denominators) and what that says about data coverage.
5. Where industry titles are available, summarize how profitability differs across industries.`,
      },
    }],
  })
);

// ── Start ──────────────────────────────────────────────────────────────

const transport = new StdioServerTransport();
await server.connect(transport);
