import fs from 'node:fs/promises';
import path from 'node:path';

import { createdAtIso } from '../util/determinism.js';
import { buildCharts, REPORT_COLUMNS, type ChartOptions } from './charts.js';
import { expandSuite, invocationCount } from './expand.js';
import { loadResultTable } from './table.js';
import { CHART_REPORT_CONTRACT_V1, MATRIX_PLAN_CONTRACT_V1 } from './types.js';
import type {
  ChartArtifact,
  ChartReportOutput,
  MatrixPlanOutput,
  MatrixRunPlan,
  MatrixRunSummary,
  ParameterCombination
} from './types.js';

export function buildMatrixPlan(plan: MatrixRunPlan): MatrixPlanOutput {
  const suites = plan.suites.map((suite) => {
    const expanded = expandSuite(suite);
    return { ...expanded, invocations: invocationCount(expanded) };
  });

  return {
    contract_id: MATRIX_PLAN_CONTRACT_V1,
    bench: plan.bench,
    csv_path: plan.csvPath,
    total: suites.reduce((sum, suite) => sum + suite.invocations, 0),
    suites
  };
}

function formatCombination(combination: ParameterCombination): string {
  const entries = Object.entries(combination);
  if (entries.length === 0) return '(no parameters)';
  return entries.map(([name, value]) => `${name}=${String(value)}`).join(' ');
}

export function renderMatrixPlanTable(plan: MatrixPlanOutput): string {
  const lines: string[] = [];
  lines.push(`bench: ${plan.bench}`);
  lines.push(`csv_path: ${plan.csv_path}`);
  lines.push(`invocations: ${plan.total}`);
  plan.suites.forEach((suite, index) => {
    lines.push('');
    lines.push(
      `suite ${index + 1}/${plan.suites.length} | notes: ${suite.notes || '-'} | repeats: ${suite.repeats} | combinations: ${suite.combinations.length} | invocations: ${suite.invocations}`
    );
    for (const combination of suite.combinations) {
      lines.push(`  ${formatCombination(combination)}`);
    }
  });
  return `${lines.join('\n')}\n`;
}

export function renderMatrixRunTable(summary: MatrixRunSummary): string {
  const lines: string[] = [];
  lines.push(`run_created_at: ${summary.created_at}`);
  lines.push(`bench: ${summary.bench}`);
  lines.push(`csv_path: ${summary.csv_path}`);
  lines.push(`attempted: ${summary.attempted}/${summary.total}`);
  lines.push(`succeeded: ${summary.succeeded}`);
  lines.push(`failed: ${summary.failed}`);
  lines.push(`stopped: ${summary.stopped ?? '-'}`);
  if (summary.failures.length > 0) {
    lines.push('');
    lines.push('run | suite | combo | repeat | exit_code | error');
    for (const failure of summary.failures) {
      lines.push(
        `${failure.completed} | ${failure.suite_index} | ${failure.combination_index} | ${failure.repeat_index} | ${failure.exit_code ?? '-'} | ${failure.error_message}`
      );
    }
  }
  return `${lines.join('\n')}\n`;
}

function pointCount(chart: ChartArtifact): number {
  return chart.series.reduce((sum, series) => sum + series.x.length, 0);
}

export function renderChartReportTable(report: ChartReportOutput): string {
  const lines: string[] = [];
  lines.push(`report_created_at: ${report.created_at}`);
  lines.push(`results_path: ${report.results_path}`);
  lines.push(`rows: ${report.row_count}`);
  lines.push('');
  lines.push('chart | series | points');
  for (const chart of report.charts) {
    lines.push(`${chart.name} | ${chart.series.length} | ${pointCount(chart)}`);
  }
  if (report.failures.length > 0) {
    lines.push('');
    lines.push('chart | error');
    for (const failure of report.failures) {
      lines.push(`${failure.name} | ${failure.error}`);
    }
  }
  return `${lines.join('\n')}\n`;
}

export interface BuildChartReportOptions extends ChartOptions {
  deterministic?: boolean;
}

export async function buildChartReport(
  resultsPath: string,
  options: BuildChartReportOptions = {}
): Promise<ChartReportOutput> {
  const table = await loadResultTable(resultsPath, { requiredColumns: REPORT_COLUMNS });
  const { charts, failures } = buildCharts(table, { trimPolicy: options.trimPolicy });

  return {
    contract_id: CHART_REPORT_CONTRACT_V1,
    created_at: createdAtIso(options.deterministic ?? false),
    results_path: path.resolve(resultsPath),
    row_count: table.rows.length,
    charts,
    failures
  };
}

/** Writes one `<name>.json` per chart; returns the written paths. */
export async function writeChartArtifacts(report: ChartReportOutput, outDir: string): Promise<string[]> {
  await fs.mkdir(outDir, { recursive: true });

  const written: string[] = [];
  for (const chart of report.charts) {
    const target = path.join(outDir, `${chart.name}.json`);
    await fs.writeFile(target, `${JSON.stringify(chart, null, 2)}\n`, 'utf8');
    written.push(target);
  }
  return written;
}
