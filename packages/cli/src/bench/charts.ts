import { PERCENTILES, POP_PERCENTILE_COLUMNS, getAvg, getFlagPairPercentiles } from './aggregate.js';
import { DEFAULT_TRIM_POLICY, decodeHistogram, toHistogramSeries, trimHistogram } from './histogram.js';
import type { ResultTable } from './table.js';
import type {
  ChartArtifact,
  ChartFailure,
  ChartMarker,
  ChartSeries,
  FlagPairLabels,
  HistogramTrimPolicy
} from './types.js';

export const THREADS_LABEL = 'MPMC-vary-threads';
export const NONBLOCKING_THREADS_LABEL = 'MPMC-nonblocking-vary-threads';
export const CAPACITY_LABEL = 'MPMC-vary-capacity';
export const PINNING_PADDING_LABEL = 'MPMC-vary-pinning-padding';
export const PAYLOAD_LABEL = 'MPMC-vary-payload';

const DEFAULT_BUCKET_WIDTH_NS = 5;
const MILLION = 1e6;

/** Columns every chart below reads; checked when the table is loaded. */
export const REPORT_COLUMNS: readonly string[] = [
  'producers',
  'consumers',
  'capacity',
  'pinning_on',
  'padding_on',
  'large_payload',
  'move_only_payload',
  'pop_ops_per_sec',
  'pop_hist_bins',
  ...Object.values(POP_PERCENTILE_COLUMNS)
];

export interface ChartOptions {
  trimPolicy?: HistogramTrimPolicy;
}

export interface ChartDefinition {
  name: string;
  build(table: ResultTable, options: ChartOptions): ChartArtifact;
}

const PINNING_PADDING_LABELS: FlagPairLabels = {
  '0,0': 'No pinning, No padding',
  '0,1': 'No pinning, Padding',
  '1,0': 'Pinning, No padding',
  '1,1': 'Pinning, Padding'
};

const PAYLOAD_LABELS: FlagPairLabels = {
  '0,0': 'Small payload, Copy',
  '0,1': 'Small payload, Move',
  '1,0': 'Large payload, Copy',
  '1,1': 'Large payload, Move'
};

function lineChart(
  name: string,
  title: string,
  xLabel: string,
  yLabel: string,
  series: ChartSeries[],
  extra: Partial<Pick<ChartArtifact, 'x_scale' | 'caption'>> = {}
): ChartArtifact {
  return {
    name,
    title,
    x_label: xLabel,
    y_label: yLabel,
    x_scale: extra.x_scale ?? 'linear',
    kind: 'line',
    series,
    markers: [],
    caption: extra.caption
  };
}

function percentileSeries(table: ResultTable, notes: string, keyColumn: string): ChartSeries[] {
  return PERCENTILES.map((name) => {
    const { keys, averages } = getAvg(table, notes, keyColumn, POP_PERCENTILE_COLUMNS[name]);
    return { label: name, x: keys, y: averages };
  });
}

function throughputSeries(table: ResultTable, notes: string, label: string): ChartSeries {
  const { keys, averages } = getAvg(table, notes, 'consumers', 'pop_ops_per_sec');
  // The single-thread point has no contention to compare and is left off.
  return {
    label,
    x: keys.slice(1),
    y: averages.slice(1).map((value) => value / MILLION)
  };
}

function flagPairChart(
  name: string,
  title: string,
  notes: string,
  flags: readonly [string, string],
  labels: FlagPairLabels,
  caption: string
): ChartDefinition {
  return {
    name,
    build(table) {
      const series = getFlagPairPercentiles(table, notes, flags, labels).map((bucket) => ({
        label: bucket.label,
        x: [...PERCENTILES],
        y: PERCENTILES.map((percentile) => bucket.percentiles[percentile])
      }));
      return lineChart(name, title, 'Percentile', 'Latency (ns)', series, { caption });
    }
  };
}

export const popHistogramChart: ChartDefinition = {
  name: 'pop_hist',
  build(table, options) {
    const row = table.select(THREADS_LABEL).find((candidate) => candidate.producers === 4);
    const series: ChartSeries[] = [];
    const markers: ChartMarker[] = [];
    let bucketWidth = DEFAULT_BUCKET_WIDTH_NS;

    if (row) {
      const width = row.hist_bucket_ns;
      if (typeof width === 'number' && width > 0) bucketWidth = width;

      const raw = decodeHistogram(row.pop_hist_bins ?? '');
      const histogram = trimHistogram(raw, options.trimPolicy ?? DEFAULT_TRIM_POLICY);
      const { x, y } = toHistogramSeries(histogram, bucketWidth, MILLION);
      series.push({ label: 'pop latency', x, y });

      for (const name of PERCENTILES) {
        const value = row[POP_PERCENTILE_COLUMNS[name]];
        if (typeof value === 'number') markers.push({ label: name, value });
      }
    }

    return {
      name: 'pop_hist',
      title: 'Consumer Latency Histogram at 4p4c',
      x_label: `Latency (ns) [bucket width = ${bucketWidth}ns]`,
      y_label: 'Count (millions)',
      x_scale: 'linear',
      kind: 'bar',
      series,
      markers
    };
  }
};

export const latencyVsThreadsChart: ChartDefinition = {
  name: 'latency_vs_threads',
  build: (table) => lineChart(
    'latency_vs_threads',
    'Latency vs Threads',
    'Threads (producers = consumers)',
    'Latency (ns)',
    percentileSeries(table, THREADS_LABEL, 'consumers')
  )
};

export const latencyVsCapacityChart: ChartDefinition = {
  name: 'latency_vs_capacity',
  build: (table) => lineChart(
    'latency_vs_capacity',
    'Latency vs Capacity',
    'Capacity',
    'Latency (ns)',
    percentileSeries(table, CAPACITY_LABEL, 'capacity'),
    { x_scale: 'log' }
  )
};

export const modeComparisonChart: ChartDefinition = {
  name: 'mode_comparison',
  build: (table) => lineChart(
    'mode_comparison',
    'Blocking vs Non-blocking Throughput (MPMC)',
    'Threads (producers = consumers)',
    'Throughput (M ops/s)',
    [
      throughputSeries(table, THREADS_LABEL, 'Blocking throughput'),
      throughputSeries(table, NONBLOCKING_THREADS_LABEL, 'Non-blocking throughput')
    ]
  )
};

export const latencyVsPinningPaddingChart: ChartDefinition = flagPairChart(
  'latency_vs_pinning_padding',
  'Consumer Latency vs Pinning / Padding at 4p4c',
  PINNING_PADDING_LABEL,
  ['pinning_on', 'padding_on'],
  PINNING_PADDING_LABELS,
  'Effect of thread pinning and cache-line padding on consumer latency.'
);

export const latencyVsPayloadChart: ChartDefinition = flagPairChart(
  'latency_vs_payload',
  'Consumer Latency vs Payload Type at 4p4c',
  PAYLOAD_LABEL,
  ['large_payload', 'move_only_payload'],
  PAYLOAD_LABELS,
  'Effect of payload size and move-only payloads on consumer latency.'
);

export const CHARTS: readonly ChartDefinition[] = [
  popHistogramChart,
  latencyVsThreadsChart,
  latencyVsCapacityChart,
  modeComparisonChart,
  latencyVsPinningPaddingChart,
  latencyVsPayloadChart
];

/**
 * Builds every chart independently; a builder that throws is reported in
 * `failures` and the remaining charts are still produced.
 */
export function buildCharts(
  table: ResultTable,
  options: ChartOptions = {},
  definitions: readonly ChartDefinition[] = CHARTS
): { charts: ChartArtifact[]; failures: ChartFailure[] } {
  const charts: ChartArtifact[] = [];
  const failures: ChartFailure[] = [];

  for (const definition of definitions) {
    try {
      charts.push(definition.build(table, options));
    } catch (err) {
      failures.push({
        name: definition.name,
        error: err instanceof Error ? err.message : String(err)
      });
    }
  }

  return { charts, failures };
}
