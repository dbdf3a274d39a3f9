import { InvalidArgumentError, MismatchedLengthError } from "../common/errors.js";
import { isFiniteNumber } from "../common/math.js";
import { assertCompatible } from "../histogram/engine.js";
import type { Histogram } from "../histogram/histogram.js";

function assertCounts(label: string, values: readonly number[]): void {
  if (!Array.isArray(values)) {
    throw new InvalidArgumentError(`${label} must be a 1D numeric array`);
  }
  for (const value of values) {
    if (typeof value !== "number") {
      throw new InvalidArgumentError(`${label} must be a 1D numeric array`);
    }
  }
}

/**
 * Binned approximate significance with per-bin weights w = ln(1 + s/b):
 *
 *   (Σ s·w − n·sqrt(Σ b·w²)) / sqrt(Σ (s + b)·w²)
 *
 * Bins with zero background give an infinite weight; drop them first.
 */
export function approxSignificance(
  sig: readonly number[],
  bkg: readonly number[],
  n = 0,
): number {
  assertCounts("sig", sig);
  assertCounts("bkg", bkg);
  if (sig.length !== bkg.length) {
    throw new MismatchedLengthError(
      `sig and bkg must have the same length (${sig.length} vs ${bkg.length})`,
    );
  }
  if (!isFiniteNumber(n) || n < 0) {
    throw new InvalidArgumentError(`n must be a non-negative number, got ${n}`);
  }

  let sw = 0;
  let sww = 0;
  let bww = 0;
  for (let index = 0; index < sig.length; index += 1) {
    const s = sig[index];
    const b = bkg[index];
    const w = Math.log(1 + s / b);
    sw += s * w;
    sww += s * w * w;
    bww += b * w * w;
  }

  const numerator = sw - n * Math.sqrt(bww);
  const denominator = Math.sqrt(sww + bww);
  return numerator / denominator;
}

export function significanceFromHistograms(
  signal: Histogram,
  background: Histogram,
  n = 0,
): number {
  assertCompatible([signal, background]);
  const sig: number[] = [];
  const bkg: number[] = [];
  for (let bin = 1; bin <= signal.nbins; bin += 1) {
    const b = background.binContent(bin);
    if (b <= 0) {
      continue;
    }
    sig.push(signal.binContent(bin));
    bkg.push(b);
  }
  return approxSignificance(sig, bkg, n);
}
