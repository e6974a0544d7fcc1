#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, type AppConfig } from './core/config.js';
import { runAnalysis, runAsk, runMovers, type EngineError } from './core/analysis-engine.js';
import type { MoverDirection, RecordTable } from './core/types.js';
import { loadWorkbook } from './ingest/workbook-loader.js';
import { METRIC_DEFINITIONS, findMetricByName } from './processing/metric-definitions.js';
import { createPredictor } from './processing/predictors.js';
import { renderBrandTable, renderTotalsTable } from './output/table-renderer.js';
import { renderMoversTable } from './output/movers-renderer.js';
import { renderAnalysisJson } from './output/json-renderer.js';
import { renderGroupTotalsCsv, renderMoversCsv, renderTotalsCsv } from './output/csv-renderer.js';
import { formatNumber } from './output/format-utils.js';

interface SourceOptions {
  sheet?: string;
  period?: string;
  top?: string;
}

interface Sources {
  historical: RecordTable;
  incoming: RecordTable | undefined;
}

async function loadSources(historicalPath: string, incomingPath: string | undefined, sheet: string | undefined): Promise<Sources> {
  const historical = await loadWorkbook(historicalPath, { sheet });
  const incoming = incomingPath ? await loadWorkbook(incomingPath, { sheet }) : undefined;
  return { historical, incoming };
}

function parseTopN(value: string | undefined, config: AppConfig): number {
  if (value === undefined) return config.topN;
  const n = parseInt(value, 10);
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`--top must be a positive integer, got "${value}"`);
  }
  return n;
}

function reportEngineError(err: EngineError): never {
  console.error(chalk.red(err.message));
  if (err.type === 'period_not_found' && err.availablePeriods) {
    console.error(chalk.dim(`Available periods: ${err.availablePeriods.join(', ')}`));
  }
  if (err.type === 'missing_key' || err.type === 'schema') {
    console.error(chalk.dim('Expected columns: PERIODO (or AÑO + MES), IDH, MARCA (optional), L14, VOL'));
  }
  process.exit(1);
}

function fail(err: unknown): never {
  console.error(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
  process.exit(1);
}

const program = new Command();

program
  .name('kpi-nl')
  .description('Monthly KPI totals, variations, movers and rule-based answers from spreadsheet records')
  .version('0.1.0');

program
  .command('analyze')
  .alias('a')
  .description('Merge a new month into the history and show totals, variations, movers and the report')
  .argument('<historical>', 'Historical workbook (.xlsx or .csv)')
  .argument('[incoming]', 'New period workbook to merge in')
  .option('-s, --sheet <name>', 'Sheet to read (default: first sheet or KPI_SHEET)')
  .option('-p, --period <period>', 'Period to report on (default: latest)')
  .option('-t, --top <n>', 'Movers per list')
  .option('-j, --json', 'Output as JSON')
  .option('--csv', 'Output totals as CSV')
  .option('--by-brand', 'With --csv, output brand totals instead of period totals')
  .action(async (historicalPath: string, incomingPath: string | undefined, options: SourceOptions & { json?: boolean; csv?: boolean; byBrand?: boolean }) => {
    try {
      const config = loadConfig();
      const sources = await loadSources(historicalPath, incomingPath, options.sheet ?? config.sheet);

      const result = runAnalysis(
        { ...sources, period: options.period, topN: parseTopN(options.top, config) },
        { predictor: createPredictor(config.predictor) }
      );
      if (!result.success) reportEngineError(result.error);

      const r = result.result;
      const p = r.provenance;
      if (incomingPath) {
        console.error(chalk.green(
          `Merged ${p.incoming_rows} new row(s): ${p.superseded_rows} replaced, ${p.merged_rows} total` +
          (p.new_periods.length > 0 ? `, new period(s) ${p.new_periods.join(', ')}` : '')
        ));
      }

      if (options.json) {
        console.log(renderAnalysisJson(r));
        return;
      }
      if (options.csv && options.byBrand) {
        if (!r.brand_totals) {
          console.error(chalk.red('No brand column in the data.'));
          process.exit(1);
        }
        console.log(renderGroupTotalsCsv(r.brand_totals, 'Brand'));
        return;
      }
      if (options.csv) {
        console.log(renderTotalsCsv(r.totals, r.variations));
        return;
      }

      console.log('');
      console.log(renderTotalsTable(r.totals, r.variations));
      console.log('');

      const target = options.period ?? r.totals[r.totals.length - 1]?.period;
      if (r.brand_totals && target) {
        console.log(renderBrandTable(r.brand_totals, target));
        console.log('');
      }

      console.log(renderMoversTable(r.movers.cost_per_unit, 'cost_per_unit'));
      console.log('');

      console.log(chalk.bold('Correo generado'));
      console.log(chalk.dim('-'.repeat(60)));
      console.log(r.report);
      console.log(chalk.dim('-'.repeat(60)));
      console.log('');

      if (r.prediction.next_cost_per_unit !== null) {
        console.log(`  Predicción próximo costo unitario (${r.prediction.predictor}): ${chalk.bold(formatNumber(r.prediction.next_cost_per_unit))}`);
        console.log('');
      }

      if (p.notes.length > 0) {
        console.log(chalk.dim(`  Notes: ${p.notes.join('; ')}`));
        console.log('');
      }
    } catch (err) {
      fail(err);
    }
  });

program
  .command('ask')
  .alias('q')
  .description('Ask a question (e.g. "top idh", "costo unitario ultimo", "variacion l14")')
  .argument('<historical>', 'Historical workbook (.xlsx or .csv)')
  .argument('[incoming]', 'New period workbook to merge in')
  .requiredOption('-q, --question <text>', 'Question to answer')
  .option('-s, --sheet <name>', 'Sheet to read')
  .option('-p, --period <period>', 'Period to answer about (default: latest)')
  .option('-t, --top <n>', 'Rows per ranked list')
  .action(async (historicalPath: string, incomingPath: string | undefined, options: SourceOptions & { question: string }) => {
    try {
      const config = loadConfig();
      const sources = await loadSources(historicalPath, incomingPath, options.sheet ?? config.sheet);

      const result = runAsk({
        ...sources,
        question: options.question,
        period: options.period,
        topN: parseTopN(options.top, config),
      });
      if (!result.success) reportEngineError(result.error);

      console.log('');
      console.log(result.result.text);
      console.log('');
    } catch (err) {
      fail(err);
    }
  });

program
  .command('movers')
  .alias('top')
  .description('Rank IDH by their latest variation of a metric')
  .argument('<historical>', 'Historical workbook (.xlsx or .csv)')
  .argument('[incoming]', 'New period workbook to merge in')
  .option('-m, --metric <name>', 'Metric: l14, vol or costo unitario', 'cost_per_unit')
  .option('-d, --direction <dir>', 'gainers or decliners', 'gainers')
  .option('-s, --sheet <name>', 'Sheet to read')
  .option('-t, --top <n>', 'Rows to show')
  .option('--csv', 'Output as CSV')
  .action(async (historicalPath: string, incomingPath: string | undefined, options: SourceOptions & { metric: string; direction: string; csv?: boolean }) => {
    try {
      const config = loadConfig();
      const metric = findMetricByName(options.metric);
      if (!metric) {
        console.error(chalk.red(`Could not identify metric: "${options.metric}"`));
        console.error('\nSupported metrics:');
        for (const m of METRIC_DEFINITIONS) {
          console.error(`  ${chalk.cyan(m.id.padEnd(16))} ${m.display_name}`);
        }
        process.exit(1);
      }

      if (options.direction !== 'gainers' && options.direction !== 'decliners') {
        console.error(chalk.red(`--direction must be gainers or decliners, got "${options.direction}"`));
        process.exit(1);
      }
      const direction: MoverDirection = options.direction;

      const sources = await loadSources(historicalPath, incomingPath, options.sheet ?? config.sheet);
      const result = runMovers({ ...sources, metric: metric.id, direction, topN: parseTopN(options.top, config) });
      if (!result.success) reportEngineError(result.error);

      if (options.csv) {
        console.log(renderMoversCsv(result.result));
        return;
      }

      const board = direction === 'gainers'
        ? { gainers: result.result, decliners: [] }
        : { gainers: [], decliners: result.result };
      console.log('');
      console.log(renderMoversTable(board, metric.id));
      console.log('');
    } catch (err) {
      fail(err);
    }
  });

program
  .command('report')
  .description('Generate the email summary text for a period')
  .argument('<historical>', 'Historical workbook (.xlsx or .csv)')
  .argument('[incoming]', 'New period workbook to merge in')
  .option('-s, --sheet <name>', 'Sheet to read')
  .option('-p, --period <period>', 'Period to report on (default: latest)')
  .action(async (historicalPath: string, incomingPath: string | undefined, options: SourceOptions) => {
    try {
      const config = loadConfig();
      const sources = await loadSources(historicalPath, incomingPath, options.sheet ?? config.sheet);
      const result = runAnalysis(
        { ...sources, period: options.period },
        { predictor: createPredictor('none') }
      );
      if (!result.success) reportEngineError(result.error);

      console.log(result.result.report);
    } catch (err) {
      fail(err);
    }
  });

program
  .command('metrics')
  .description('List the tracked metrics')
  .action(() => {
    console.log(chalk.bold('\nTracked Metrics\n'));
    for (const m of METRIC_DEFINITIONS) {
      console.log(`  ${chalk.cyan(m.id.padEnd(16))} ${m.display_name}`);
      console.log(`  ${''.padEnd(16)} ${chalk.dim(m.description)}`);
      console.log(`  ${''.padEnd(16)} ${chalk.dim('Columns: ' + m.source_columns.join(', '))}`);
      console.log('');
    }
  });

await program.parseAsync();
