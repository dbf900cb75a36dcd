import { fileURLToPath } from 'node:url';

import { describe, expect, it } from 'vitest';

import { REPORT_COLUMNS, buildCharts } from '../src/bench/charts.js';
import { loadResultTable, parseResultCsv } from '../src/bench/table.js';
import type { ChartArtifact } from '../src/bench/types.js';

const RESULTS_FIXTURE = fileURLToPath(new URL('./fixtures/mpmc_results.csv', import.meta.url));

function chartByName(charts: ChartArtifact[], name: string): ChartArtifact {
  const chart = charts.find((candidate) => candidate.name === name);
  if (!chart) throw new Error(`missing chart ${name}`);
  return chart;
}

describe('chart series', () => {
  it('builds every chart from the recorded runs', async () => {
    const table = await loadResultTable(RESULTS_FIXTURE, { requiredColumns: REPORT_COLUMNS });
    const { charts, failures } = buildCharts(table);

    expect(failures).toEqual([]);
    expect(charts.map((chart) => chart.name)).toEqual([
      'pop_hist',
      'latency_vs_threads',
      'latency_vs_capacity',
      'mode_comparison',
      'latency_vs_pinning_padding',
      'latency_vs_payload'
    ]);
  });

  it('trims the 4p4c histogram and marks its percentiles', async () => {
    const table = await loadResultTable(RESULTS_FIXTURE);
    const chart = chartByName(buildCharts(table).charts, 'pop_hist');

    expect(chart.kind).toBe('bar');
    expect(chart.x_label).toBe('Latency (ns) [bucket width = 5ns]');
    expect(chart.series).toEqual([{ label: 'pop latency', x: [0, 5, 10, 15], y: [2, 1, 0.003, 0] }]);
    expect(chart.markers).toEqual([
      { label: 'p50', value: 80 },
      { label: 'p99', value: 160 },
      { label: 'p999', value: 400 }
    ]);
  });

  it('averages percentiles per thread count and per capacity', async () => {
    const { charts } = buildCharts(await loadResultTable(RESULTS_FIXTURE));

    expect(chartByName(charts, 'latency_vs_threads').series).toEqual([
      { label: 'p50', x: [1, 2, 4], y: [40, 60, 85] },
      { label: 'p99', x: [1, 2, 4], y: [90, 120, 165] },
      { label: 'p999', x: [1, 2, 4], y: [200, 300, 405] }
    ]);

    const capacity = chartByName(charts, 'latency_vs_capacity');
    expect(capacity.x_scale).toBe('log');
    expect(capacity.series).toEqual([
      { label: 'p50', x: [64, 1024], y: [70, 65] },
      { label: 'p99', x: [64, 1024], y: [150, 140] },
      { label: 'p999', x: [64, 1024], y: [350, 330] }
    ]);
  });

  it('compares blocking and non-blocking throughput without the single-thread point', async () => {
    const { charts } = buildCharts(await loadResultTable(RESULTS_FIXTURE));

    expect(chartByName(charts, 'mode_comparison').series).toEqual([
      { label: 'Blocking throughput', x: [2, 4], y: [8, 6.5] },
      { label: 'Non-blocking throughput', x: [2, 4], y: [2, 1.5] }
    ]);
  });

  it('plots one percentile line per complete flag combination', async () => {
    const { charts } = buildCharts(await loadResultTable(RESULTS_FIXTURE));

    expect(chartByName(charts, 'latency_vs_pinning_padding').series).toEqual([
      { label: 'No pinning, No padding', x: ['p50', 'p99', 'p999'], y: [100, 200, 300] },
      { label: 'Pinning, Padding', x: ['p50', 'p99', 'p999'], y: [80, 160, 240] }
    ]);
    expect(chartByName(charts, 'latency_vs_payload').series).toEqual([
      { label: 'Small payload, Copy', x: ['p50', 'p99', 'p999'], y: [85, 170, 320] },
      { label: 'Large payload, Copy', x: ['p50', 'p99', 'p999'], y: [120, 260, 500] },
      { label: 'Large payload, Move', x: ['p50', 'p99', 'p999'], y: [90, 180, 330] }
    ]);
  });

  it('keeps building other charts when a histogram is malformed', () => {
    const table = parseResultCsv([
      'notes,producers,consumers,pop_ops_per_sec,pop_lat_p50_ns,pop_lat_p99_ns,pop_lat_p999_ns,pop_hist_bins',
      'MPMC-vary-threads,4,4,1000000,10,20,30,1;x;3'
    ].join('\n'));

    const { charts, failures } = buildCharts(table);

    expect(failures).toEqual([{ name: 'pop_hist', error: 'histogram bucket 1 is not a non-negative integer: "x"' }]);
    expect(charts).toHaveLength(5);
    expect(chartByName(charts, 'latency_vs_threads').series[0]).toEqual({ label: 'p50', x: [4], y: [10] });
  });

  it('produces empty series when no run carries the expected labels', () => {
    const table = parseResultCsv('notes,producers,pop_hist_bins\nsomething-else,4,1;2\n');
    const { charts, failures } = buildCharts(table);

    expect(failures).toEqual([]);
    expect(chartByName(charts, 'pop_hist').series).toEqual([]);
    expect(chartByName(charts, 'latency_vs_pinning_padding').series).toEqual([]);
    expect(chartByName(charts, 'latency_vs_threads').series[0]).toEqual({ label: 'p50', x: [], y: [] });
  });
});
