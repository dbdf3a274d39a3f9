import { IncompatibleBinningError, InvalidArgumentError } from "../common/errors.js";
import { isFiniteNumber } from "../common/math.js";
import type { FeatureTable } from "../features/featureTable.js";
import type { FillHolesMode, HistogramBinning } from "../types.js";
import { DEFAULT_HISTOGRAM_BINS, binningFromSamples, matchBinning } from "./binning.js";
import { Histogram } from "./histogram.js";

export const DEFAULT_HOLE_FILL = 1e-3;

export interface BuildHistogramOptions {
  name?: string;
  /** Target integral after filling; `null` keeps raw counts. */
  integral?: number | null;
}

export interface MakeHistogramsOptions {
  integral?: number | null;
  binsByLabel?: Readonly<Record<string, HistogramBinning>>;
}

export interface SumHistogramsOptions {
  subtract?: boolean;
  name?: string;
}

export interface FillHolesOptions {
  value?: number;
}

export function buildHistogram(
  samples: readonly number[],
  binning: HistogramBinning = binningFromSamples(samples),
  options: BuildHistogramOptions = {},
): Histogram {
  if (!Array.isArray(samples)) {
    throw new InvalidArgumentError("samples must be a 1D numeric array");
  }
  const histogram = new Histogram(options.name ?? "histogram", binning);
  for (const value of samples) {
    if (typeof value !== "number") {
      throw new InvalidArgumentError("samples must be a 1D numeric array");
    }
    histogram.fill(value);
  }

  const target = options.integral === undefined ? 1 : options.integral;
  if (target !== null) {
    normalize(histogram, target);
  }
  return histogram;
}

/** Rescales to `target`; a zero-integral histogram is left as is. */
export function normalize(histogram: Histogram, target = 1): number {
  if (!isFiniteNumber(target)) {
    throw new InvalidArgumentError(`integral must be a finite number, got ${target}`);
  }
  const raw = histogram.integral();
  const factor = raw !== 0 ? target / raw : 1;
  histogram.scale(factor);
  return factor;
}

export function assertCompatible(histograms: readonly Histogram[]): void {
  const [first, ...rest] = histograms;
  for (const other of rest) {
    if (!first.isCompatible(other)) {
      throw new IncompatibleBinningError(
        `histogram ${other.name} (${describeBinning(other)}) does not match ` +
          `${first.name} (${describeBinning(first)})`,
      );
    }
  }
}

export function sumHistograms(
  histograms: readonly Histogram[],
  options: SumHistogramsOptions = {},
): Histogram {
  if (!Array.isArray(histograms) || histograms.length === 0) {
    throw new InvalidArgumentError("at least one histogram is required");
  }
  assertCompatible(histograms);

  const [first, ...rest] = histograms;
  const result = new Histogram(options.name ?? first.name, first.binning);
  for (let bin = 1; bin <= first.nbins; bin += 1) {
    let value = first.binContent(bin);
    for (const other of rest) {
      value = options.subtract ? value - other.binContent(bin) : value + other.binContent(bin);
    }
    result.setBinContent(bin, value);
  }
  return result;
}

export function findEmptyBins(histogram: Histogram): number[] {
  const empty: number[] = [];
  for (let bin = 1; bin <= histogram.nbins; bin += 1) {
    if (histogram.binContent(bin) === 0) {
      empty.push(bin);
    }
  }
  return empty;
}

/**
 * Replaces empty bins in place. `constant` writes a small fixed value;
 * `linear` interpolates over bin index between the nearest non-empty bins.
 * Empty runs before the first or after the last non-empty bin have no
 * bracketing anchors and stay at zero.
 */
export function fillHoles(
  histogram: Histogram,
  mode: FillHolesMode = "constant",
  options: FillHolesOptions = {},
): Histogram {
  const value = options.value ?? DEFAULT_HOLE_FILL;
  if (mode === "constant" && (!isFiniteNumber(value) || value <= 0)) {
    throw new InvalidArgumentError(`hole fill value must be a positive number, got ${value}`);
  }
  const empty = findEmptyBins(histogram);
  if (empty.length === 0) {
    return histogram;
  }

  if (mode === "constant") {
    for (const bin of empty) {
      histogram.setBinContent(bin, value);
    }
    return histogram;
  }

  if (mode !== "linear") {
    throw new InvalidArgumentError(`unknown fill mode: ${String(mode)}`);
  }

  const anchors: number[] = [];
  for (let bin = 1; bin <= histogram.nbins; bin += 1) {
    if (histogram.binContent(bin) !== 0) {
      anchors.push(bin);
    }
  }
  for (const bin of empty) {
    const interpolated = interpolate(histogram, anchors, bin);
    histogram.setBinContent(bin, Number.isFinite(interpolated) ? interpolated : 0);
  }
  return histogram;
}

function interpolate(histogram: Histogram, anchors: readonly number[], bin: number): number {
  let left: number | undefined;
  let right: number | undefined;
  for (const anchor of anchors) {
    if (anchor < bin) {
      left = anchor;
    } else if (anchor > bin) {
      right = anchor;
      break;
    }
  }
  if (left === undefined || right === undefined) {
    return Number.NaN;
  }
  const leftValue = histogram.binContent(left);
  const rightValue = histogram.binContent(right);
  return leftValue + ((rightValue - leftValue) * (bin - left)) / (right - left);
}

export function makeHistograms(
  table: FeatureTable,
  options: MakeHistogramsOptions = {},
): Record<string, Histogram> {
  const binsByLabel = options.binsByLabel ?? DEFAULT_HISTOGRAM_BINS;
  const histograms: Record<string, Histogram> = {};
  for (const label of table.columns) {
    const samples = table.column(label).filter((value) => !Number.isNaN(value));
    if (samples.length === 0) {
      continue;
    }
    const binning = matchBinning(label, binsByLabel) ?? binningFromSamples(samples);
    histograms[label] = buildHistogram(samples, binning, {
      name: label,
      integral: options.integral === undefined ? 1 : options.integral,
    });
  }
  return histograms;
}

export function reviewHoles(histograms: Readonly<Record<string, Histogram>>): string[] {
  return Object.entries(histograms)
    .filter(([, histogram]) => findEmptyBins(histogram).length > 0)
    .map(([name]) => name);
}

function describeBinning(histogram: Histogram): string {
  return `nbins=${histogram.nbins}, low=${histogram.low}, high=${histogram.high}`;
}
