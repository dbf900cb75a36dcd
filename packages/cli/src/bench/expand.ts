import type { ExpandedSuite, ParameterCombination, SuiteConfig } from './types.js';

/**
 * Cartesian product of the suite's sweep parameters, first parameter varying
 * slowest. A suite with no sweep parameters has exactly one (empty) combination.
 */
export function expandSuite(suite: SuiteConfig): ExpandedSuite {
  let combinations: ParameterCombination[] = [{}];

  for (const parameter of suite.parameters) {
    const next: ParameterCombination[] = [];
    for (const partial of combinations) {
      for (const value of parameter.values) {
        next.push({ ...partial, [parameter.name]: value });
      }
    }
    combinations = next;
  }

  return {
    repeats: suite.repeats,
    notes: suite.notes,
    combinations
  };
}

export function invocationCount(expanded: ExpandedSuite): number {
  return Math.max(expanded.repeats, 0) * expanded.combinations.length;
}

export function countInvocations(suites: SuiteConfig[]): number {
  return suites.reduce((sum, suite) => sum + invocationCount(expandSuite(suite)), 0);
}

export function buildInvocationArgs(
  combination: ParameterCombination,
  notes: string,
  csvPath: string
): string[] {
  const args: string[] = [];
  for (const [name, value] of Object.entries(combination)) {
    args.push(`--${name}`, String(value));
  }
  args.push('--notes', notes);
  args.push('--csv', csvPath);
  return args;
}
