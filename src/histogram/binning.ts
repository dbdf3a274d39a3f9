import { InvalidArgumentError } from "../common/errors.js";
import type { HistogramBinning } from "../types.js";

export const DEFAULT_HISTOGRAM_BINS: Readonly<Record<string, HistogramBinning>> = {
  "#Delta{R}": { nbins: 96, low: 0, high: 7 },
  "#Delta{#eta}": { nbins: 80, low: -5, high: 5 },
  "#Delta{#phi}": { nbins: 52, low: -3.25, high: 3.25 },
  "#Delta{pT}": { nbins: 120, low: 0, high: 1500 },
  "#Delta{#vec{pT}}": { nbins: 240, low: 0, high: 4800 },
  "#Delta{#vec{p}}": { nbins: 240, low: 0, high: 4800 },
  "MET(GeV)": { nbins: 80, low: 0, high: 1000 },
  "pT_": { nbins: 160, low: 0, high: 2000 },
  "sT(GeV)": { nbins: 200, low: 0, high: 4000 },
  "mT(GeV)": { nbins: 200, low: 0, high: 4000 },
  "#eta_": { nbins: 80, low: -5, high: 5 },
  "#phi_": { nbins: 128, low: -3.2, high: 3.2 },
  "Energy_": { nbins: 80, low: 0, high: 1000 },
};

/**
 * Sturges' rule: floor(1 + log2(L)) bins spanning [min, max] of the samples.
 * A heuristic starting point; callers can always pass explicit bins.
 */
export function binningFromSamples(samples: readonly number[]): HistogramBinning {
  if (!Array.isArray(samples)) {
    throw new InvalidArgumentError("samples must be a 1D numeric array");
  }
  if (samples.length === 0) {
    throw new InvalidArgumentError("samples must not be empty");
  }

  let low = Number.POSITIVE_INFINITY;
  let high = Number.NEGATIVE_INFINITY;
  for (const value of samples) {
    if (typeof value !== "number" || Number.isNaN(value)) {
      throw new InvalidArgumentError("samples must be a 1D numeric array");
    }
    low = Math.min(low, value);
    high = Math.max(high, value);
  }

  return {
    nbins: Math.floor(1 + Math.log2(samples.length)),
    low,
    high,
  };
}

/** Binning for a feature label: last dictionary key contained in the label. */
export function matchBinning(
  label: string,
  binsByLabel: Readonly<Record<string, HistogramBinning>> = DEFAULT_HISTOGRAM_BINS,
): HistogramBinning | undefined {
  let matched: HistogramBinning | undefined;
  for (const [key, binning] of Object.entries(binsByLabel)) {
    if (label.includes(key)) {
      matched = binning;
    }
  }
  return matched;
}
