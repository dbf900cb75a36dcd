export { MatrixConfigError, defaultCsvPath, loadMatrixConfig, parseMatrixConfig, resolveBenchPath } from './config.js';
export { buildInvocationArgs, countInvocations, expandSuite, invocationCount } from './expand.js';
export { consoleReporter, formatProgress, runMatrix, spawnLauncher } from './runner.js';
export type { LaunchResult, ProcessLauncher, RunMatrixOptions, RunReporter } from './runner.js';
export { LABEL_COLUMN, ResultTable, ResultTableError, loadResultTable, parseCsvRecords, parseResultCsv } from './table.js';
export { POP_PERCENTILE_COLUMNS, getAvg, getFlagPairPercentiles, groupRows } from './aggregate.js';
export { DEFAULT_TRIM_POLICY, HistogramError, decodeHistogram, toHistogramSeries, trimHistogram } from './histogram.js';
export { CHARTS, REPORT_COLUMNS, buildCharts } from './charts.js';
export type { ChartDefinition, ChartOptions } from './charts.js';
export {
  buildChartReport,
  buildMatrixPlan,
  renderChartReportTable,
  renderMatrixPlanTable,
  renderMatrixRunTable,
  writeChartArtifacts
} from './report.js';
export * from './types.js';
