import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { afterEach, describe, expect, it } from 'vitest';

import { main } from '../src/cli.js';
import type { LaunchResult, ProcessLauncher, RunReporter } from '../src/bench/runner.js';

const RESULTS_FIXTURE = fileURLToPath(new URL('./fixtures/mpmc_results.csv', import.meta.url));

const MATRIX = `
bench: ./bin/mpmc_bench
suites:
  - notes: MPMC-vary-capacity
    repeats: 2
    producers: 4
    capacity: [64, 256]
  - producers: 1
`;

const silentReporter: RunReporter = {
  progress() {},
  failure() {},
  done() {}
};

function fakeLauncher(exitCode: number): ProcessLauncher & { calls: Array<{ command: string; args: string[] }> } {
  const calls: Array<{ command: string; args: string[] }> = [];
  return {
    calls,
    async launch(command, args): Promise<LaunchResult> {
      calls.push({ command, args });
      return { exit_code: exitCode };
    }
  };
}

async function withTmpDir(run: (tmpDir: string) => Promise<void>): Promise<void> {
  const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'benchmatrix-cli-'));
  try {
    await run(tmpDir);
  } finally {
    await fs.rm(tmpDir, { recursive: true, force: true });
  }
}

describe('benchmatrix CLI', () => {
  afterEach(() => {
    process.exitCode = 0;
  });

  it('plans a matrix without running it', async () => {
    await withTmpDir(async (tmpDir) => {
      const matrixPath = path.join(tmpDir, 'mpmc_matrix.yaml');
      const planOut = path.join(tmpDir, 'plan.json');
      await fs.writeFile(matrixPath, MATRIX, 'utf8');

      const code = await main(['node', 'benchmatrix', 'plan', '--matrix', matrixPath, '--out', planOut]);
      expect(code).toBe(0);

      const plan = JSON.parse(await fs.readFile(planOut, 'utf8')) as {
        contract_id: string;
        bench: string;
        csv_path: string;
        total: number;
        suites: Array<{ notes: string; invocations: number }>;
      };
      expect(plan.contract_id).toBe('benchmatrix.plan.v1');
      expect(plan.bench).toBe(path.join(process.cwd(), 'bin', 'mpmc_bench'));
      expect(plan.csv_path).toBe(path.join('results', 'raw', 'mpmc_results.csv'));
      expect(plan.total).toBe(5);
      expect(plan.suites.map((suite) => [suite.notes, suite.invocations])).toEqual([
        ['MPMC-vary-capacity', 4],
        ['', 1]
      ]);
    });
  });

  it('renders the plan as a table', async () => {
    await withTmpDir(async (tmpDir) => {
      const matrixPath = path.join(tmpDir, 'mpmc_matrix.yaml');
      const planOut = path.join(tmpDir, 'plan.txt');
      await fs.writeFile(matrixPath, MATRIX, 'utf8');

      const code = await main([
        'node', 'benchmatrix', 'plan',
        '--matrix', matrixPath,
        '--csv', 'out.csv',
        '--format', 'table',
        '--out', planOut
      ]);
      expect(code).toBe(0);

      const lines = (await fs.readFile(planOut, 'utf8')).split('\n');
      expect(lines).toContain('csv_path: out.csv');
      expect(lines).toContain('invocations: 5');
      expect(lines).toContain('suite 1/2 | notes: MPMC-vary-capacity | repeats: 2 | combinations: 2 | invocations: 4');
      expect(lines).toContain('  producers=4 capacity=64');
      expect(lines).toContain('suite 2/2 | notes: - | repeats: 1 | combinations: 1 | invocations: 1');
    });
  });

  it('runs every invocation and writes a summary', async () => {
    await withTmpDir(async (tmpDir) => {
      const matrixPath = path.join(tmpDir, 'mpmc_matrix.yaml');
      const csvPath = path.join(tmpDir, 'results.csv');
      const runOut = path.join(tmpDir, 'run.json');
      await fs.writeFile(matrixPath, MATRIX, 'utf8');
      const launcher = fakeLauncher(0);

      const code = await main(
        ['node', 'benchmatrix', 'run', '--matrix', matrixPath, '--csv', csvPath, '--out', runOut, '--deterministic'],
        { launcher, reporter: silentReporter }
      );
      expect(code).toBe(0);

      expect(launcher.calls).toHaveLength(5);
      expect(launcher.calls[0]).toEqual({
        command: path.join(tmpDir, 'bin', 'mpmc_bench'),
        args: ['--producers', '4', '--capacity', '64', '--notes', 'MPMC-vary-capacity', '--csv', csvPath]
      });
      expect(launcher.calls[4]?.args).toEqual(['--producers', '1', '--notes', '', '--csv', csvPath]);

      const summary = JSON.parse(await fs.readFile(runOut, 'utf8')) as Record<string, unknown>;
      expect(summary).toMatchObject({
        contract_id: 'benchmatrix.run.v1',
        created_at: '1970-01-01T00:00:00.000Z',
        total: 5,
        attempted: 5,
        succeeded: 5,
        failed: 0,
        stopped: null
      });
    });
  });

  it('exits with 1 when invocations fail and stops early with --fail-fast', async () => {
    await withTmpDir(async (tmpDir) => {
      const matrixPath = path.join(tmpDir, 'mpmc_matrix.yaml');
      const runOut = path.join(tmpDir, 'run.txt');
      await fs.writeFile(matrixPath, MATRIX, 'utf8');
      const launcher = fakeLauncher(2);

      const code = await main(
        [
          'node', 'benchmatrix', 'run',
          '--matrix', matrixPath,
          '--csv', path.join(tmpDir, 'results.csv'),
          '--fail-fast',
          '--format', 'table',
          '--out', runOut
        ],
        { launcher, reporter: silentReporter }
      );
      expect(code).toBe(1);
      expect(launcher.calls).toHaveLength(1);

      const lines = (await fs.readFile(runOut, 'utf8')).split('\n');
      expect(lines).toContain('attempted: 1/5');
      expect(lines).toContain('stopped: fail_fast');
      expect(lines).toContain('1 | 1 | 1 | 1 | 2 | exited with code 2');
    });
  });

  it('exits with 2 on an invalid matrix before running anything', async () => {
    await withTmpDir(async (tmpDir) => {
      const matrixPath = path.join(tmpDir, 'mpmc_matrix.yaml');
      await fs.writeFile(matrixPath, 'suites: []\n', 'utf8');
      const launcher = fakeLauncher(0);

      const code = await main(['node', 'benchmatrix', 'run', '--matrix', matrixPath], {
        launcher,
        reporter: silentReporter
      });
      expect(code).toBe(2);
      expect(launcher.calls).toEqual([]);
    });
  });

  it('writes one data file per chart from a result CSV', async () => {
    await withTmpDir(async (tmpDir) => {
      const outDir = path.join(tmpDir, 'fig');
      const reportOut = path.join(tmpDir, 'report.txt');

      const code = await main([
        'node', 'benchmatrix', 'report',
        '--results', RESULTS_FIXTURE,
        '--out-dir', outDir,
        '--format', 'table',
        '--out', reportOut
      ]);
      expect(code).toBe(0);

      expect((await fs.readdir(outDir)).sort()).toEqual([
        'latency_vs_capacity.json',
        'latency_vs_payload.json',
        'latency_vs_pinning_padding.json',
        'latency_vs_threads.json',
        'mode_comparison.json',
        'pop_hist.json'
      ]);

      const threads = JSON.parse(await fs.readFile(path.join(outDir, 'latency_vs_threads.json'), 'utf8')) as {
        series: Array<{ label: string; x: number[]; y: number[] }>;
      };
      expect(threads.series[0]).toEqual({ label: 'p50', x: [1, 2, 4], y: [40, 60, 85] });

      const lines = (await fs.readFile(reportOut, 'utf8')).split('\n');
      expect(lines).toContain('rows: 14');
      expect(lines).toContain('pop_hist | 1 | 4');
      expect(lines).toContain('latency_vs_threads | 3 | 9');
      expect(lines).toContain('latency_vs_capacity | 3 | 6');
      expect(lines).toContain('mode_comparison | 2 | 4');
      expect(lines).toContain('latency_vs_pinning_padding | 2 | 6');
      expect(lines).toContain('latency_vs_payload | 3 | 9');
    });
  });

  it('exits with 2 when the result CSV lacks chart columns', async () => {
    await withTmpDir(async (tmpDir) => {
      const resultsPath = path.join(tmpDir, 'results.csv');
      await fs.writeFile(resultsPath, 'notes,producers\nx,1\n', 'utf8');

      const code = await main([
        'node', 'benchmatrix', 'report',
        '--results', resultsPath,
        '--out-dir', path.join(tmpDir, 'fig')
      ]);
      expect(code).toBe(2);
    });
  });
});
