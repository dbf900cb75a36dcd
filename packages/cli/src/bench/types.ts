export const MATRIX_RUN_CONTRACT_V1 = 'benchmatrix.run.v1' as const;
export const MATRIX_PLAN_CONTRACT_V1 = 'benchmatrix.plan.v1' as const;
export const CHART_REPORT_CONTRACT_V1 = 'benchmatrix.report.v1' as const;

export const RESERVED_SUITE_KEYS = ['repeats', 'notes'] as const;
export type ReservedSuiteKey = (typeof RESERVED_SUITE_KEYS)[number];

export type ParameterValue = string | number | boolean;

export interface SuiteConfig {
  repeats: number;
  notes: string;
  /** Sweep parameters in declaration order. */
  parameters: Array<{ name: string; values: ParameterValue[] }>;
}

export interface MatrixConfig {
  bench: string;
  suites: SuiteConfig[];
}

export interface LoadedMatrixConfig {
  config_path: string;
  config_dir: string;
  config: MatrixConfig;
}

export type ParameterCombination = Record<string, ParameterValue>;

export interface ExpandedSuite {
  repeats: number;
  notes: string;
  combinations: ParameterCombination[];
}

export interface MatrixRunPlan {
  bench: string;
  suites: SuiteConfig[];
  csvPath: string;
}

export interface RunInvocation {
  command: string;
  args: string[];
  suite_index: number;
  combination_index: number;
  repeat_index: number;
}

export interface InvocationProgress {
  completed: number;
  total: number;
  suite_index: number;
  suite_count: number;
  combination_index: number;
  combination_count: number;
  repeat_index: number;
  repeat_count: number;
}

export interface InvocationFailure {
  completed: number;
  suite_index: number;
  combination_index: number;
  repeat_index: number;
  args: string[];
  exit_code: number | null;
  error_message: string;
  stderr_excerpt?: string;
}

export type MatrixStopReason = 'fail_fast' | 'aborted';

export interface MatrixRunSummary {
  contract_id: typeof MATRIX_RUN_CONTRACT_V1;
  created_at: string;
  bench: string;
  csv_path: string;
  total: number;
  attempted: number;
  succeeded: number;
  failed: number;
  stopped: MatrixStopReason | null;
  failures: InvocationFailure[];
}

export interface MatrixPlanOutput {
  contract_id: typeof MATRIX_PLAN_CONTRACT_V1;
  bench: string;
  csv_path: string;
  total: number;
  suites: Array<ExpandedSuite & { invocations: number }>;
}

export type CellValue = number | string;

export type ResultRow = Readonly<Record<string, CellValue>>;

export type Histogram = number[];

export type HistogramTrimPolicy =
  | { kind: 'relative'; ratio: number; pad: number }
  | { kind: 'absolute'; minCount: number; pad: number };

export type PercentileName = 'p50' | 'p99' | 'p999';

export type PercentileColumns = Record<PercentileName, string>;

export type FlagBit = 0 | 1;

export type FlagPairKey = '0,0' | '0,1' | '1,0' | '1,1';

export type FlagPairLabels = Record<FlagPairKey, string>;

export interface FlagPairBucket {
  key: [FlagBit, FlagBit];
  label: string;
  percentiles: Record<PercentileName, number>;
}

export interface AverageSeries {
  keys: CellValue[];
  averages: number[];
}

export interface ChartSeries {
  label: string;
  x: CellValue[];
  y: number[];
}

export interface ChartMarker {
  label: string;
  value: number;
}

export interface ChartArtifact {
  name: string;
  title: string;
  x_label: string;
  y_label: string;
  x_scale: 'linear' | 'log';
  kind: 'line' | 'bar';
  series: ChartSeries[];
  markers: ChartMarker[];
  caption?: string;
}

export interface ChartFailure {
  name: string;
  error: string;
}

export interface ChartReportOutput {
  contract_id: typeof CHART_REPORT_CONTRACT_V1;
  created_at: string;
  results_path: string;
  row_count: number;
  charts: ChartArtifact[];
  failures: ChartFailure[];
}
