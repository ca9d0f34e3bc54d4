#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { executeAuctionListCore, executeAuctionAnalysisCore } from './core/auction-engine.js';
import { loadConfig, APP_NAME, APP_VERSION, type AppConfig } from './core/config.js';
import { createSources } from './core/sources.js';
import { describeError } from './core/errors.js';
import { renderAuctionTable } from './output/auction-renderer.js';
import { renderAnalysisTable } from './output/analysis-renderer.js';
import { renderAuctionCsv } from './output/csv-renderer.js';
import { renderJson } from './output/json-renderer.js';
import { getMethodology } from './processing/methodology.js';

function fail(message: string): never {
  console.error(chalk.red(`Error: ${message}`));
  process.exit(1);
}

function configOrExit(): AppConfig {
  try {
    return loadConfig();
  } catch (err) {
    return fail(describeError(err));
  }
}

/** Parse an integer flag; undefined when absent, exits on garbage */
function intOption(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const n = parseInt(value, 10);
  if (Number.isNaN(n)) fail(`${flag} must be a number, got "${value}"`);
  return n;
}

interface AuctionsOptions {
  type?: string;
  term?: string;
  days?: string;
  limit?: string;
  json?: boolean;
  csv?: boolean;
}

interface AnalysisOptions {
  term?: string;
  days?: string;
  json?: boolean;
}

const program = new Command();

program
  .name(APP_NAME)
  .description('US Treasury auction results with demand grades and trend analysis')
  .version(APP_VERSION);

program
  .command('auctions')
  .alias('a')
  .description('List recent auction results with demand metrics (e.g., auctions --type Note --term 10-Year)')
  .option('-t, --type <type>', 'Security type: Note, Bond, Bill, TIPS, FRN')
  .option('--term <term>', 'Security term, e.g. 10-Year, 4-Week')
  .option('-d, --days <n>', 'Lookback period in days (1-365)', '30')
  .option('-l, --limit <n>', 'Max auctions to show (1-100)', '20')
  .option('-j, --json', 'Output as JSON')
  .option('--csv', 'Output as CSV')
  .action(async (options: AuctionsOptions) => {
    const sources = createSources(configOrExit());
    const result = await executeAuctionListCore(sources, {
      securityType: options.type,
      securityTerm: options.term,
      daysBack: intOption(options.days, '--days'),
      limit: intOption(options.limit, '--limit'),
    });

    if (options.json) {
      console.log(renderJson(result));
    } else if (options.csv) {
      console.log(renderAuctionCsv(result));
    } else {
      console.log('');
      console.log(renderAuctionTable(result));
      console.log('');
    }
  });

program
  .command('analysis')
  .alias('analyze')
  .description('Assess auction demand health and per-maturity trends (e.g., analysis --term 10-Year --days 180)')
  .option('--term <term>', 'Focus on one maturity, e.g. 10-Year')
  .option('-d, --days <n>', 'Lookback period in days (1-365)', '90')
  .option('-j, --json', 'Output as JSON')
  .action(async (options: AnalysisOptions) => {
    const sources = createSources(configOrExit());
    const result = await executeAuctionAnalysisCore(sources, {
      securityTerm: options.term,
      daysBack: intOption(options.days, '--days'),
    });

    if (options.json) {
      console.log(renderJson(result));
    } else {
      console.log('');
      console.log(renderAnalysisTable(result));
      console.log('');
    }
  });

program
  .command('methodology')
  .description('Show grading thresholds, weights and demand signal bands')
  .action(() => {
    const m = getMethodology();
    console.log(chalk.bold('\nAuction Grading Methodology\n'));
    console.log(`  Graded types: ${m.gradeable_types.join(', ')}\n`);
    for (const metric of m.metrics) {
      const dir = metric.direction === 'lower_is_better' ? 'lower is better' : 'higher is better';
      const t = metric.thresholds;
      console.log(`  ${chalk.cyan(metric.label.padEnd(20))} weight ${(metric.weight * 100).toFixed(0)}%, ${dir}`);
      console.log(`  ${''.padEnd(20)} ${chalk.dim(`A ${t.A}  B ${t.B}  C ${t.C}  D ${t.D}`)}`);
      console.log(`  ${''.padEnd(20)} ${chalk.dim(metric.description)}`);
      console.log('');
    }
    console.log(`  Composite: ${m.composite_bands.map(b => `${b.grade} ≥ ${b.min_gpa}`).join(', ')}`);
    console.log(`  WI proxy:  ${m.wi_proxy.preferred}, falling back to ${m.wi_proxy.fallback} ` +
      `when the two differ by more than ${m.wi_proxy.max_divergence_pct} pct points`);
    console.log('');
  });

program.parseAsync().catch((err: unknown) => fail(describeError(err)));
