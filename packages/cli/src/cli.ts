#!/usr/bin/env node

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { fileURLToPath } from 'node:url';
import fs from 'node:fs/promises';

import { MatrixConfigError, defaultCsvPath, loadMatrixConfig } from './bench/config.js';
import { runMatrix, type ProcessLauncher, type RunReporter } from './bench/runner.js';
import { ResultTableError } from './bench/table.js';
import {
  buildChartReport,
  buildMatrixPlan,
  renderChartReportTable,
  renderMatrixPlanTable,
  renderMatrixRunTable,
  writeChartArtifacts
} from './bench/report.js';
import type { MatrixRunPlan } from './bench/types.js';

export interface CliDependencies {
  launcher?: ProcessLauncher;
  reporter?: RunReporter;
}

async function writeOutput(args: { out?: string | unknown }, content: string): Promise<void> {
  if (args.out) {
    await fs.writeFile(String(args.out), content, 'utf8');
    return;
  }
  process.stdout.write(content);
}

function renderJson(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}

async function resolveRunPlan(args: { matrix?: string | unknown; csv?: string | unknown }): Promise<MatrixRunPlan> {
  const matrixPath = String(args.matrix);
  const loaded = await loadMatrixConfig(matrixPath);
  return {
    bench: loaded.config.bench,
    suites: loaded.config.suites,
    csvPath: args.csv ? String(args.csv) : defaultCsvPath(matrixPath)
  };
}

/** Input errors become exit code 2 with a one-line message; anything else propagates. */
async function reportInputErrors(run: () => Promise<void>): Promise<void> {
  try {
    await run();
  } catch (err) {
    if (err instanceof MatrixConfigError || err instanceof ResultTableError) {
      console.error(`error: ${err.message}`);
      process.exitCode = 2;
      return;
    }
    throw err;
  }
}

export async function main(argv = process.argv, deps: CliDependencies = {}): Promise<number> {
  // `process.exitCode` persists across multiple `main()` calls in the same process (tests).
  process.exitCode = 0;

  const parser = yargs(hideBin(argv))
    .scriptName('benchmatrix')
    .strict()
    .help()
    .option('format', {
      choices: ['json', 'table'] as const,
      default: 'json',
      describe: 'Output format'
    })
    .option('out', {
      type: 'string',
      describe: 'Write output to this file (default: stdout)'
    })
    .option('deterministic', {
      type: 'boolean',
      default: false,
      describe: 'Freeze timestamps for reproducible outputs'
    })
    .command(
      'plan',
      'Expand a matrix config and list every invocation without running it',
      (cmd) =>
        cmd
          .option('matrix', {
            type: 'string',
            demandOption: true,
            describe: 'Path to the matrix YAML (<family>_<name>.yaml)'
          })
          .option('csv', {
            type: 'string',
            describe: 'Result CSV the benchmark appends to (default: results/raw/<family>_results.csv)'
          }),
      async (args) => {
        await reportInputErrors(async () => {
          const plan = buildMatrixPlan(await resolveRunPlan(args));
          await writeOutput(args, args.format === 'table' ? renderMatrixPlanTable(plan) : renderJson(plan));
        });
      }
    )
    .command(
      'run',
      'Run the benchmark once per combination and repeat of every suite',
      (cmd) =>
        cmd
          .option('matrix', {
            type: 'string',
            demandOption: true,
            describe: 'Path to the matrix YAML (<family>_<name>.yaml)'
          })
          .option('csv', {
            type: 'string',
            describe: 'Result CSV the benchmark appends to (default: results/raw/<family>_results.csv)'
          })
          .option('fail-fast', {
            type: 'boolean',
            default: false,
            describe: 'Stop at the first failed invocation'
          }),
      async (args) => {
        await reportInputErrors(async () => {
          const plan = await resolveRunPlan(args);

          const controller = new AbortController();
          const onInterrupt = () => controller.abort();
          process.once('SIGINT', onInterrupt);

          try {
            const summary = await runMatrix(plan, {
              launcher: deps.launcher,
              reporter: deps.reporter,
              failFast: Boolean(args.failFast),
              signal: controller.signal,
              deterministic: Boolean(args.deterministic)
            });
            await writeOutput(args, args.format === 'table' ? renderMatrixRunTable(summary) : renderJson(summary));
            if (summary.failed > 0 || summary.stopped) {
              process.exitCode = 1;
            }
          } finally {
            process.removeListener('SIGINT', onInterrupt);
          }
        });
      }
    )
    .command(
      'report',
      'Aggregate a result CSV into one JSON data file per chart',
      (cmd) =>
        cmd
          .option('results', {
            type: 'string',
            demandOption: true,
            describe: 'Path to the result CSV'
          })
          .option('out-dir', {
            type: 'string',
            default: 'docs/fig',
            describe: 'Directory for the chart data files'
          }),
      async (args) => {
        await reportInputErrors(async () => {
          const report = await buildChartReport(String(args.results), {
            deterministic: Boolean(args.deterministic)
          });
          await writeChartArtifacts(report, String(args.outDir));
          await writeOutput(args, args.format === 'table' ? renderChartReportTable(report) : renderJson(report));
          if (report.failures.length > 0) {
            process.exitCode = 1;
          }
        });
      }
    )
    .demandCommand(1, 'Provide a command');

  await parser.parse();
  return typeof process.exitCode === 'number' ? process.exitCode : 0;
}

// Only run if invoked as a binary, not imported by tests.
const isInvokedAsBin = (() => {
  try {
    const thisFile = fileURLToPath(import.meta.url);
    return process.argv[1] === thisFile;
  } catch {
    return false;
  }
})();

if (isInvokedAsBin) {
  main().catch((err) => {
    console.error(err);
    process.exitCode = 1;
  });
}
