import type { CellValue, Histogram, HistogramTrimPolicy } from './types.js';

export const DEFAULT_TRIM_POLICY: HistogramTrimPolicy = { kind: 'relative', ratio: 0.005, pad: 2 };

export class HistogramError extends Error {
  readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'HistogramError';
    this.details = details;
  }
}

const COUNT = /^\d+$/;

/** Decodes a `;`-joined bucket count cell, e.g. `"10;20;30"`. */
export function decodeHistogram(cell: CellValue): Histogram {
  const text = String(cell).trim();
  if (text.length === 0) return [];

  return text.split(';').map((token, index) => {
    const trimmed = token.trim();
    if (!COUNT.test(trimmed)) {
      throw new HistogramError(`histogram bucket ${index} is not a non-negative integer: "${token}"`, {
        bucket: index,
        value: token
      });
    }
    return Number(trimmed);
  });
}

function lastSignificantIndex(histogram: Histogram, threshold: number): number {
  for (let i = histogram.length - 1; i >= 0; i -= 1) {
    if (histogram[i] >= threshold) return i;
  }
  return 0;
}

/**
 * Drops the tail of near-empty buckets: keeps everything up to the last
 * bucket that reaches the policy's threshold, plus `pad` trailing buckets.
 * An all-zero histogram has no significant bucket and keeps `pad + 1`.
 */
export function trimHistogram(histogram: Histogram, policy: HistogramTrimPolicy = DEFAULT_TRIM_POLICY): Histogram {
  if (histogram.length === 0) return histogram;

  let lastIdx: number;
  if (policy.kind === 'relative') {
    const peak = histogram.reduce((max, count) => Math.max(max, count), 0);
    lastIdx = peak === 0 ? 0 : lastSignificantIndex(histogram, peak * policy.ratio);
  } else {
    lastIdx = lastSignificantIndex(histogram, policy.minCount);
  }

  return histogram.slice(0, Math.min(lastIdx + policy.pad + 1, histogram.length));
}

/** Bar positions (bucket start) and heights divided by `scale`. */
export function toHistogramSeries(
  histogram: Histogram,
  bucketWidth: number,
  scale = 1
): { x: number[]; y: number[] } {
  return {
    x: histogram.map((_, index) => index * bucketWidth),
    y: histogram.map((count) => count / scale)
  };
}
