#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { runRatioPipeline, classifyError, type PipelineError } from './core/pipeline.js';
import { loadCompanyData } from './core/dataset-loader.js';
import { fetchSicCodes } from './core/sic-client.js';
import { ConceptNotFoundError } from './core/errors.js';
import { parseRowLimit } from './cli-options.js';
import { DATA_DIR, DEFAULT_QUARTER, DEFAULT_YEAR } from './core/config.js';
import { CONCEPT_DEFINITIONS, findConceptByName, loadConceptDefinitions } from './processing/concept-definitions.js';
import { RATIO_DEFINITIONS } from './processing/ratio-definitions.js';
import { renderRatioTable, renderConceptList, renderCompanyList } from './output/table-renderer.js';
import { renderRatioCsv, renderLogFeatureCsv } from './output/csv-renderer.js';
import { renderRatioJson } from './output/json-renderer.js';
import { renderSicTable, renderSicCsv } from './output/sic-renderer.js';

interface CohortOptions {
  dataDir?: string;
  year?: string;
  quarter?: string;
}

interface RatioCommandOptions extends CohortOptions {
  concepts?: string;
  defaultValue?: string;
  log?: boolean;
  industry?: boolean;
  json?: boolean;
  csv?: boolean;
  limit?: string;
}

function reportError(err: PipelineError): void {
  console.error(chalk.red(err.message));
  if (err.missingColumns && err.missingColumns.length > 0) {
    console.error(chalk.dim(`Missing columns: ${err.missingColumns.join(', ')}`));
  }
  if (err.type === 'source_unavailable' && err.source) {
    console.error(chalk.dim(`Source: ${err.source}`));
  }
}

function reportUnexpected(err: unknown): never {
  console.error(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
  process.exit(1);
}

async function executeRatios(options: RatioCommandOptions): Promise<void> {
  const limit = parseRowLimit(options.limit);
  const defaultValue = options.defaultValue !== undefined ? parseFloat(options.defaultValue) : 0;

  const outcome = await runRatioPipeline({
    dataDir: options.dataDir ?? DATA_DIR,
    year: options.year ? parseInt(options.year, 10) : DEFAULT_YEAR,
    quarter: (options.quarter ?? DEFAULT_QUARTER).toUpperCase(),
    conceptsPath: options.concepts,
    defaultValue,
    includeLog: options.log ?? false,
    includeIndustry: options.industry ?? false,
  });

  if (!outcome.success) {
    reportError(outcome.error);
    process.exit(1);
  }

  const r = outcome.result;
  console.error(chalk.dim(`Number of filings: ${r.stats.filings}`));
  console.error(chalk.dim(`After duplicates were removed: ${r.stats.companies}`));
  console.error(chalk.dim(`Selected facts: ${r.stats.facts_selected}`));
  console.error(chalk.dim(`Final number of companies: ${r.stats.companies_with_facts}`));
  if (r.dropped.length > 0) {
    console.error(chalk.yellow(
      `Note: ${r.dropped.length} companies dropped (liabilities could not be derived from the balance sheet identity)`
    ));
  }

  if (options.json) {
    console.log(renderRatioJson(r));
  } else if (options.csv) {
    console.log(r.log_rows ? renderLogFeatureCsv(r.log_rows) : renderRatioCsv(r.rows, r.industries));
  } else {
    console.log('');
    console.log(renderRatioTable(r, limit ?? 25));
    console.log('');
  }
}

const program = new Command();

program
  .name('filing-ratios')
  .description('Reconcile SEC financial statement tags into canonical concepts and derive financial ratios')
  .version('0.1.0');

program
  .command('ratios')
  .alias('r')
  .description('Compute the ratio table for a quarterly 10-Q cohort')
  .option('-d, --data-dir <dir>', 'Directory holding sub.txt and num.txt', DATA_DIR)
  .option('-y, --year <n>', 'Fiscal year', String(DEFAULT_YEAR))
  .option('-q, --quarter <fp>', 'Fiscal period (Q1-Q4)', DEFAULT_QUARTER)
  .option('-c, --concepts <file>', 'Concept-to-tag mapping file (JSON)')
  .option('--default-value <n>', 'Value substituted for non-finite ratios', '0')
  .option('--log', 'Output log-scaled features (ln(0.01 + x)) with --csv')
  .option('--industry', 'Annotate companies with their SIC industry title')
  .option('-j, --json', 'Output as JSON')
  .option('--csv', 'Output as CSV')
  .option('-l, --limit <n>', 'Rows to show in the terminal table', '25')
  .action(async (options: RatioCommandOptions) => {
    try {
      await executeRatios(options);
    } catch (err) {
      reportUnexpected(err);
    }
  });

program
  .command('companies')
  .description('List the 10-Q filings selected for a cohort, one per company')
  .option('-d, --data-dir <dir>', 'Directory holding sub.txt', DATA_DIR)
  .option('-y, --year <n>', 'Fiscal year', String(DEFAULT_YEAR))
  .option('-q, --quarter <fp>', 'Fiscal period (Q1-Q4)', DEFAULT_QUARTER)
  .option('-l, --limit <n>', 'Rows to show')
  .action(async (options: CohortOptions & { limit?: string }) => {
    try {
      const limit = parseRowLimit(options.limit);
      const selection = await loadCompanyData({
        dataDir: options.dataDir ?? DATA_DIR,
        year: options.year ? parseInt(options.year, 10) : DEFAULT_YEAR,
        quarter: (options.quarter ?? DEFAULT_QUARTER).toUpperCase(),
      });
      console.error(chalk.dim(`Number of filings: ${selection.filing_count}`));
      console.error(chalk.dim(`After duplicates were removed: ${selection.company_count}`));
      console.log('');
      console.log(renderCompanyList(selection.submissions, limit));
      console.log('');
    } catch (err) {
      try {
        reportError(classifyError(err));
        process.exit(1);
      } catch (unexpected) {
        reportUnexpected(unexpected);
      }
    }
  });

program
  .command('concepts')
  .description('List canonical concepts and their tag priority lists')
  .argument('[name]', 'Show a single concept (id, name, column or keyword)')
  .option('-c, --concepts <file>', 'Concept-to-tag mapping file (JSON)')
  .action((name: string | undefined, options: { concepts?: string }) => {
    try {
      const concepts = options.concepts ? loadConceptDefinitions(options.concepts) : CONCEPT_DEFINITIONS;
      if (name) {
        const concept = findConceptByName(name, concepts);
        if (!concept) throw new ConceptNotFoundError(name, concepts.map(c => c.id));
        console.log(renderConceptList([concept]));
        return;
      }
      console.log(renderConceptList(concepts));
      console.log(chalk.bold('Ratios\n'));
      for (const r of RATIO_DEFINITIONS) {
        console.log(`  ${chalk.cyan(r.id.padEnd(24))} ${r.display_name}`);
        console.log(`  ${''.padEnd(24)} ${chalk.dim(r.formula)}`);
      }
      console.log('');
    } catch (err) {
      if (err instanceof ConceptNotFoundError) {
        console.error(chalk.red(err.message));
        console.error('\nAvailable concepts:');
        for (const id of err.availableConcepts) console.error(`  ${chalk.cyan(id)}`);
        process.exit(1);
      }
      reportUnexpected(err);
    }
  });

program
  .command('sic')
  .description('Fetch the SEC SIC industry code table')
  .argument('[filter]', 'Only show industries or offices containing this text')
  .option('--csv', 'Output as CSV')
  .action(async (filter: string | undefined, options: { csv?: boolean }) => {
    try {
      const codes = await fetchSicCodes();
      if (options.csv) {
        console.log(renderSicCsv(codes));
      } else {
        console.log('');
        console.log(renderSicTable(codes, filter));
        console.log('');
      }
    } catch (err) {
      try {
        reportError(classifyError(err));
        process.exit(1);
      } catch (unexpected) {
        reportUnexpected(unexpected);
      }
    }
  });

await program.parseAsync();
