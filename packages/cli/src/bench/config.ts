import fs from 'node:fs/promises';
import path from 'node:path';
import YAML from 'yaml';

import {
  RESERVED_SUITE_KEYS,
  type LoadedMatrixConfig,
  type MatrixConfig,
  type ParameterValue,
  type ReservedSuiteKey,
  type SuiteConfig
} from './types.js';

type MatrixConfigErrorReason = 'MATRIX_CONFIG_PARSE_ERROR' | 'MATRIX_CONFIG_INVALID';

const PARAMETER_NAME = /^[A-Za-z][A-Za-z0-9_-]*$/;
// Flag the runner appends itself; a suite may not sweep it.
const SINK_FLAG = 'csv';

export class MatrixConfigError extends Error {
  readonly reason: MatrixConfigErrorReason;
  readonly details?: Record<string, unknown>;

  constructor(reason: MatrixConfigErrorReason, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'MatrixConfigError';
    this.reason = reason;
    this.details = details;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function isReservedKey(key: string): key is ReservedSuiteKey {
  return (RESERVED_SUITE_KEYS as readonly string[]).includes(key);
}

function readString(value: unknown, field: string): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new MatrixConfigError('MATRIX_CONFIG_INVALID', `${field} must be a non-empty string`, { field, value });
  }
  return value.trim();
}

function readInteger(value: unknown, field: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || !Number.isInteger(value)) {
    throw new MatrixConfigError('MATRIX_CONFIG_INVALID', `${field} must be an integer`, { field, value });
  }
  return value;
}

function readScalar(value: unknown, field: string): ParameterValue {
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  throw new MatrixConfigError('MATRIX_CONFIG_INVALID', `${field} must be a string, number or boolean`, {
    field,
    value
  });
}

function parseParameterValues(value: unknown, field: string): ParameterValue[] {
  if (!Array.isArray(value)) {
    return [readScalar(value, field)];
  }

  if (value.length === 0) {
    throw new MatrixConfigError('MATRIX_CONFIG_INVALID', `${field} must list at least one value`, { field });
  }

  return value.map((item, index) => readScalar(item, `${field}[${index}]`));
}

function parseSuite(value: unknown, fieldPrefix: string): SuiteConfig {
  if (!isRecord(value)) {
    throw new MatrixConfigError('MATRIX_CONFIG_INVALID', `${fieldPrefix} must be an object`, { field: fieldPrefix });
  }

  let notes = '';
  if (value.notes !== undefined && value.notes !== null) {
    if (typeof value.notes !== 'string') {
      throw new MatrixConfigError('MATRIX_CONFIG_INVALID', `${fieldPrefix}.notes must be a string`, {
        field: `${fieldPrefix}.notes`,
        value: value.notes
      });
    }
    notes = value.notes;
  }

  const parameters: SuiteConfig['parameters'] = [];
  for (const [name, raw] of Object.entries(value)) {
    if (isReservedKey(name)) continue;

    const field = `${fieldPrefix}.${name}`;
    if (!PARAMETER_NAME.test(name) || name === SINK_FLAG) {
      throw new MatrixConfigError('MATRIX_CONFIG_INVALID', `${field} is not a usable parameter name`, {
        field,
        name
      });
    }
    parameters.push({ name, values: parseParameterValues(raw, field) });
  }

  return {
    repeats: value.repeats === undefined ? 1 : readInteger(value.repeats, `${fieldPrefix}.repeats`),
    notes,
    parameters
  };
}

function parseSuites(value: unknown): SuiteConfig[] {
  if (!Array.isArray(value)) {
    throw new MatrixConfigError('MATRIX_CONFIG_INVALID', 'suites must be an array', { field: 'suites', value });
  }

  return value.map((item, index) => parseSuite(item, `suites[${index}]`));
}

export function parseMatrixConfig(rawConfig: string): MatrixConfig {
  let parsed: unknown;
  try {
    parsed = YAML.parse(rawConfig);
  } catch (err) {
    throw new MatrixConfigError('MATRIX_CONFIG_PARSE_ERROR', 'Failed to parse matrix config', {
      error: err instanceof Error ? err.message : String(err)
    });
  }

  if (!isRecord(parsed)) {
    throw new MatrixConfigError('MATRIX_CONFIG_INVALID', 'matrix config must be an object', { field: 'root' });
  }

  return {
    bench: readString(parsed.bench, 'bench'),
    suites: parseSuites(parsed.suites)
  };
}

/**
 * Resolves `bench` against the working directory when it names a path, the
 * same base the default result CSV uses. Bare executable names are left alone
 * so the OS can look them up on PATH.
 */
export function resolveBenchPath(bench: string, cwd = process.cwd()): string {
  if (path.isAbsolute(bench)) return bench;
  if (!bench.includes('/') && !bench.includes(path.sep)) return bench;
  return path.resolve(cwd, bench);
}

export async function loadMatrixConfig(configPath: string): Promise<LoadedMatrixConfig> {
  const absoluteConfigPath = path.resolve(configPath);

  let raw: string;
  try {
    raw = await fs.readFile(absoluteConfigPath, 'utf8');
  } catch (err) {
    throw new MatrixConfigError('MATRIX_CONFIG_PARSE_ERROR', `Failed to read matrix config: ${absoluteConfigPath}`, {
      path: absoluteConfigPath,
      error: err instanceof Error ? err.message : String(err)
    });
  }

  const config = parseMatrixConfig(raw);
  const configDir = path.dirname(absoluteConfigPath);
  return {
    config_path: absoluteConfigPath,
    config_dir: configDir,
    config: {
      ...config,
      bench: resolveBenchPath(config.bench)
    }
  };
}

/**
 * Result file for a matrix named `<family>_<anything>.yaml`:
 * `results/raw/<family>_results.csv`.
 */
export function defaultCsvPath(matrixPath: string): string {
  const fileName = path.basename(matrixPath);
  const separator = fileName.indexOf('_');
  if (separator <= 0) {
    throw new MatrixConfigError(
      'MATRIX_CONFIG_INVALID',
      `matrix file name must look like <family>_<name>.yaml: ${fileName}`,
      { field: 'matrix', value: fileName }
    );
  }
  return path.join('results', 'raw', `${fileName.slice(0, separator)}_results.csv`);
}
