import { spawn } from 'node:child_process';

import { createdAtIso } from '../util/determinism.js';
import { buildInvocationArgs, countInvocations, expandSuite } from './expand.js';
import { MATRIX_RUN_CONTRACT_V1 } from './types.js';
import type {
  InvocationFailure,
  InvocationProgress,
  MatrixRunPlan,
  MatrixRunSummary,
  MatrixStopReason,
  RunInvocation
} from './types.js';

const OUTPUT_EXCERPT_LIMIT = 300;

export interface LaunchResult {
  exit_code: number | null;
  error_message?: string;
  stderr_excerpt?: string;
}

export interface ProcessLauncher {
  launch(command: string, args: string[]): Promise<LaunchResult>;
}

export interface RunReporter {
  progress(progress: InvocationProgress, invocation: RunInvocation): void;
  failure(failure: InvocationFailure): void;
  done(summary: MatrixRunSummary): void;
}

export interface RunMatrixOptions {
  launcher?: ProcessLauncher;
  reporter?: RunReporter;
  /** Stop after the first failed invocation instead of carrying on. */
  failFast?: boolean;
  /** Checked between invocations; a running process is always waited for. */
  signal?: AbortSignal;
  deterministic?: boolean;
}

function excerpt(value: string | undefined): string | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (!trimmed) return undefined;
  return trimmed.length <= OUTPUT_EXCERPT_LIMIT
    ? trimmed
    : `${trimmed.slice(0, OUTPUT_EXCERPT_LIMIT - 3)}...`;
}

export function formatProgress(progress: InvocationProgress): string {
  return `[${progress.completed}/${progress.total}] Suite ${progress.suite_index}/${progress.suite_count}, `
    + `Combo ${progress.combination_index}/${progress.combination_count}, `
    + `Repeat ${progress.repeat_index}/${progress.repeat_count}`;
}

export const spawnLauncher: ProcessLauncher = {
  launch(command, args) {
    return new Promise<LaunchResult>((resolve) => {
      const child = spawn(command, args, {
        stdio: ['ignore', 'inherit', 'pipe']
      });

      let stderr = '';
      let settled = false;

      const settle = (result: LaunchResult) => {
        if (settled) return;
        settled = true;
        resolve(result);
      };

      child.stderr?.on('data', (chunk: Buffer) => {
        const text = chunk.toString('utf8');
        process.stderr.write(text);
        if (stderr.length >= OUTPUT_EXCERPT_LIMIT) return;
        stderr = `${stderr}${text}`.slice(0, OUTPUT_EXCERPT_LIMIT);
      });

      child.on('error', (err) => {
        settle({
          exit_code: null,
          error_message: err.message,
          stderr_excerpt: excerpt(stderr)
        });
      });

      child.on('close', (code, signal) => {
        if (code === 0) {
          settle({ exit_code: 0 });
          return;
        }
        settle({
          exit_code: code,
          error_message: signal ? `terminated by ${signal}` : `exited with code ${String(code)}`,
          stderr_excerpt: excerpt(stderr)
        });
      });
    });
  }
};

export const consoleReporter: RunReporter = {
  progress(progress) {
    process.stdout.write(`\n${formatProgress(progress)}\n`);
  },
  failure(failure) {
    const where = `suite ${failure.suite_index}, combo ${failure.combination_index}, repeat ${failure.repeat_index}`;
    console.error(`invocation ${failure.completed} failed (${where}): ${failure.error_message}`);
  },
  done(summary) {
    process.stdout.write(`\nCompleted ${summary.attempted} run(s).\n`);
  }
};

export async function runMatrix(plan: MatrixRunPlan, options: RunMatrixOptions = {}): Promise<MatrixRunSummary> {
  const launcher = options.launcher ?? spawnLauncher;
  const reporter = options.reporter ?? consoleReporter;
  const total = countInvocations(plan.suites);
  const failures: InvocationFailure[] = [];

  let completed = 0;
  let stopped: MatrixStopReason | null = null;

  suites: for (let suiteIdx = 0; suiteIdx < plan.suites.length; suiteIdx += 1) {
    const { repeats, notes, combinations } = expandSuite(plan.suites[suiteIdx]);

    for (let comboIdx = 0; comboIdx < combinations.length; comboIdx += 1) {
      const args = buildInvocationArgs(combinations[comboIdx], notes, plan.csvPath);

      for (let repeat = 0; repeat < repeats; repeat += 1) {
        if (options.signal?.aborted) {
          stopped = 'aborted';
          break suites;
        }

        completed += 1;
        const invocation: RunInvocation = {
          command: plan.bench,
          args,
          suite_index: suiteIdx + 1,
          combination_index: comboIdx + 1,
          repeat_index: repeat + 1
        };
        reporter.progress({
          completed,
          total,
          suite_index: suiteIdx + 1,
          suite_count: plan.suites.length,
          combination_index: comboIdx + 1,
          combination_count: combinations.length,
          repeat_index: repeat + 1,
          repeat_count: repeats
        }, invocation);

        const result = await launcher.launch(plan.bench, args);
        if (result.exit_code === 0) continue;

        const failure: InvocationFailure = {
          completed,
          suite_index: invocation.suite_index,
          combination_index: invocation.combination_index,
          repeat_index: invocation.repeat_index,
          args,
          exit_code: result.exit_code,
          error_message: result.error_message ?? `exited with code ${String(result.exit_code)}`,
          stderr_excerpt: result.stderr_excerpt
        };
        failures.push(failure);
        reporter.failure(failure);

        if (options.failFast) {
          stopped = 'fail_fast';
          break suites;
        }
      }
    }
  }

  const summary: MatrixRunSummary = {
    contract_id: MATRIX_RUN_CONTRACT_V1,
    created_at: createdAtIso(options.deterministic ?? false),
    bench: plan.bench,
    csv_path: plan.csvPath,
    total,
    attempted: completed,
    succeeded: completed - failures.length,
    failed: failures.length,
    stopped,
    failures
  };
  reporter.done(summary);
  return summary;
}
