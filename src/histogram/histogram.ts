import { InvalidArgumentError } from "../common/errors.js";
import { isFiniteNumber, nearlyEqual } from "../common/math.js";
import type { HistogramBinning } from "../types.js";

// Half-width used to open up a zero-width range.
const DEGENERATE_HALF_WIDTH = 0.5;

/**
 * Fixed uniform-width 1D histogram. Bins are numbered 1..nbins; values
 * outside [low, high) are clipped into the first or last bin.
 */
export class Histogram {
  readonly name: string;
  readonly nbins: number;
  readonly low: number;
  readonly high: number;
  private readonly bins: Float64Array;
  private factor = 1;

  constructor(name: string, binning: HistogramBinning) {
    const { nbins } = binning;
    if (!Number.isInteger(nbins) || nbins < 1) {
      throw new InvalidArgumentError(`histogram ${name}: nbins must be a positive integer, got ${nbins}`);
    }
    if (!isFiniteNumber(binning.low) || !isFiniteNumber(binning.high)) {
      throw new InvalidArgumentError(`histogram ${name}: range bounds must be finite`);
    }
    if (binning.high < binning.low) {
      throw new InvalidArgumentError(
        `histogram ${name}: high (${binning.high}) must not be below low (${binning.low})`,
      );
    }
    const degenerate = binning.high === binning.low;
    this.name = name;
    this.nbins = nbins;
    this.low = degenerate ? binning.low - DEGENERATE_HALF_WIDTH : binning.low;
    this.high = degenerate ? binning.high + DEGENERATE_HALF_WIDTH : binning.high;
    this.bins = new Float64Array(nbins);
  }

  get binning(): HistogramBinning {
    return { nbins: this.nbins, low: this.low, high: this.high };
  }

  get binWidth(): number {
    return (this.high - this.low) / this.nbins;
  }

  /** Product of every factor applied through `scale`. */
  get scaleFactor(): number {
    return this.factor;
  }

  findBin(value: number): number {
    if (value < this.low) {
      return 1;
    }
    if (value >= this.high) {
      return this.nbins;
    }
    const index = Math.floor((value - this.low) / this.binWidth) + 1;
    return Math.min(Math.max(index, 1), this.nbins);
  }

  /** Returns the filled bin, or 0 when the value is NaN and was ignored. */
  fill(value: number, weight = 1): number {
    if (Number.isNaN(value)) {
      return 0;
    }
    const bin = this.findBin(value);
    this.bins[bin - 1] += weight;
    return bin;
  }

  binContent(bin: number): number {
    return this.bins[this.offset(bin)];
  }

  setBinContent(bin: number, value: number): void {
    this.bins[this.offset(bin)] = value;
  }

  binCenter(bin: number): number {
    this.offset(bin);
    return this.low + (bin - 0.5) * this.binWidth;
  }

  contents(): number[] {
    return Array.from(this.bins);
  }

  integral(): number {
    let total = 0;
    for (const value of this.bins) {
      total += value;
    }
    return total;
  }

  scale(factor: number): void {
    if (!isFiniteNumber(factor)) {
      throw new InvalidArgumentError(`histogram ${this.name}: scale factor must be finite`);
    }
    for (let index = 0; index < this.bins.length; index += 1) {
      this.bins[index] *= factor;
    }
    this.factor *= factor;
  }

  /**
   * Compares the effective bin edges. A zero-width range is widened on
   * construction, so `{ nbins, low: v, high: v }` matches
   * `{ nbins, low: v - 0.5, high: v + 0.5 }`.
   */
  isCompatible(other: Histogram): boolean {
    return (
      this.nbins === other.nbins &&
      nearlyEqual(this.low, other.low) &&
      nearlyEqual(this.high, other.high) &&
      nearlyEqual(this.binWidth, other.binWidth)
    );
  }

  private offset(bin: number): number {
    if (!Number.isInteger(bin) || bin < 1 || bin > this.nbins) {
      throw new InvalidArgumentError(
        `histogram ${this.name}: bin ${bin} outside 1..${this.nbins}`,
      );
    }
    return bin - 1;
  }
}
