import test from "node:test";
import assert from "node:assert/strict";
import { IncompatibleBinningError, InvalidArgumentError } from "../src/common/errors.js";
import { FeatureTable } from "../src/features/featureTable.js";
import {
  buildHistogram,
  fillHoles,
  findEmptyBins,
  makeHistograms,
  normalize,
  reviewHoles,
  sumHistograms,
} from "../src/histogram/engine.js";
import { Histogram } from "../src/histogram/histogram.js";

function withContents(name: string, contents: number[], low = 0, high = contents.length): Histogram {
  const histogram = new Histogram(name, { nbins: contents.length, low, high });
  contents.forEach((value, index) => histogram.setBinContent(index + 1, value));
  return histogram;
}

test("Histogram numbers bins from one and clips out-of-range values", () => {
  const histogram = new Histogram("h", { nbins: 4, low: 0, high: 2 });
  assert.equal(histogram.binWidth, 0.5);
  assert.equal(histogram.fill(0.1), 1);
  assert.equal(histogram.fill(1.25), 3);
  assert.equal(histogram.fill(-3), 1);
  assert.equal(histogram.fill(2), 4);
  assert.equal(histogram.fill(99, 2), 4);
  assert.equal(histogram.fill(Number.NaN), 0);
  assert.deepEqual(histogram.contents(), [2, 0, 1, 3]);
  assert.equal(histogram.integral(), 6);
  assert.equal(histogram.binCenter(2), 0.75);
  assert.throws(() => histogram.binContent(0), InvalidArgumentError);
  assert.throws(() => histogram.binContent(5), InvalidArgumentError);
});

test("Histogram validates its binning", () => {
  assert.throws(() => new Histogram("h", { nbins: 0, low: 0, high: 1 }), InvalidArgumentError);
  assert.throws(() => new Histogram("h", { nbins: 2.5, low: 0, high: 1 }), InvalidArgumentError);
  assert.throws(() => new Histogram("h", { nbins: 2, low: 1, high: 0 }), InvalidArgumentError);
  assert.throws(() => new Histogram("h", { nbins: 2, low: 0, high: Infinity }), InvalidArgumentError);
});

test("Histogram widens a zero-width range around its value", () => {
  const histogram = new Histogram("flat", { nbins: 7, low: 0, high: 0 });
  assert.equal(histogram.low, -0.5);
  assert.equal(histogram.high, 0.5);
  assert.equal(histogram.fill(0), 4);
});

test("buildHistogram normalises to unit integral by default", () => {
  const histogram = buildHistogram([0.5, 1.5, 1.5, 2.5], { nbins: 3, low: 0, high: 3 }, { name: "x" });
  assert.equal(histogram.name, "x");
  assert.deepEqual(histogram.contents(), [0.25, 0.5, 0.25]);
  assert.equal(histogram.scaleFactor, 0.25);
});

test("buildHistogram scales to a requested integral or keeps raw counts", () => {
  const samples = [0.5, 1.5, 1.5, 2.5];
  const binning = { nbins: 3, low: 0, high: 3 };
  assert.deepEqual(buildHistogram(samples, binning, { integral: 8 }).contents(), [2, 4, 2]);
  const raw = buildHistogram(samples, binning, { integral: null });
  assert.deepEqual(raw.contents(), [1, 2, 1]);
  assert.equal(raw.scaleFactor, 1);
});

test("buildHistogram derives Sturges binning when none is given", () => {
  const histogram = buildHistogram(Array.from({ length: 21 }, (_, index) => index), undefined, {
    integral: null,
  });
  assert.deepEqual(histogram.binning, { nbins: 5, low: 0, high: 20 });
  assert.deepEqual(histogram.contents(), [4, 4, 4, 4, 5]);
});

test("zero-integral histograms are not rescaled", () => {
  const histogram = buildHistogram([Number.NaN], { nbins: 2, low: 0, high: 1 });
  assert.deepEqual(histogram.contents(), [0, 0]);
  assert.equal(histogram.scaleFactor, 1);
  assert.equal(normalize(withContents("empty", [0, 0])), 1);
});

test("sumHistograms adds or subtracts compatible histograms bin by bin", () => {
  const a = withContents("a", [1, 2, 3]);
  const b = withContents("b", [0.5, 0.5, 4]);
  const c = withContents("c", [1, 0, 0]);
  assert.deepEqual(sumHistograms([a, b, c]).contents(), [2.5, 2.5, 7]);
  assert.deepEqual(sumHistograms([a, b, c], { subtract: true }).contents(), [-0.5, 1.5, -1]);
  assert.equal(sumHistograms([a, b]).name, "a");
  assert.equal(sumHistograms([a, b], { name: "total" }).name, "total");
  assert.deepEqual(a.contents(), [1, 2, 3]);
});

test("a widened zero-width range matches the range it was widened to", () => {
  const widened = new Histogram("flat", { nbins: 7, low: 0, high: 0 });
  const explicit = new Histogram("explicit", { nbins: 7, low: -0.5, high: 0.5 });
  widened.fill(0);
  explicit.fill(0.4);
  assert.ok(widened.isCompatible(explicit));
  assert.deepEqual(sumHistograms([widened, explicit]).contents(), [0, 0, 0, 1, 0, 0, 1]);
  assert.equal(widened.isCompatible(new Histogram("unit", { nbins: 7, low: 0, high: 1 })), false);
});

test("sumHistograms tolerates floating noise on the edges", () => {
  const a = withContents("a", [1, 1], 0, 1);
  const b = withContents("b", [2, 3], 0, 1 + 1e-12);
  assert.deepEqual(sumHistograms([a, b]).contents(), [3, 4]);
});

test("sumHistograms rejects mismatched binning", () => {
  const base = withContents("a", [1, 2, 3]);
  assert.throws(() => sumHistograms([base, withContents("b", [1, 2])]), IncompatibleBinningError);
  assert.throws(() => sumHistograms([base, withContents("c", [1, 2, 3], 1, 4)]), IncompatibleBinningError);
  assert.throws(() => sumHistograms([base, withContents("d", [1, 2, 3], 0, 6)]), IncompatibleBinningError);
  assert.throws(() => sumHistograms([]), InvalidArgumentError);
});

test("findEmptyBins returns one-based indices of exact zeros", () => {
  assert.deepEqual(findEmptyBins(withContents("h", [0, 1, 0, -2, 0.001, 0])), [1, 3, 6]);
  assert.deepEqual(findEmptyBins(withContents("h", [1, 2])), []);
});

test("constant hole filling leaves no empty bin", () => {
  const histogram = fillHoles(withContents("h", [0, 3, 0, 5]), "constant");
  assert.deepEqual(histogram.contents(), [0.001, 3, 0.001, 5]);
  assert.deepEqual(findEmptyBins(histogram), []);
  assert.deepEqual(fillHoles(withContents("h", [0, 2]), "constant", { value: 0.5 }).contents(), [0.5, 2]);
});

test("constant hole filling rejects values that would leave holes", () => {
  for (const value of [0, -1, Number.NaN, Infinity]) {
    const histogram = withContents("h", [0, 3, 0]);
    assert.throws(() => fillHoles(histogram, "constant", { value }), InvalidArgumentError);
    assert.deepEqual(histogram.contents(), [0, 3, 0]);
  }
  assert.throws(() => fillHoles(withContents("h", [1, 2]), "constant", { value: 0 }), InvalidArgumentError);
});

test("linear hole filling interpolates between bracketing bins", () => {
  const histogram = fillHoles(withContents("h", [0, 2, 0, 0, 8, 0]), "linear");
  assert.deepEqual(histogram.contents(), [0, 2, 4, 6, 8, 0]);
});

test("linear hole filling keeps boundary runs and all-empty histograms at zero", () => {
  assert.deepEqual(fillHoles(withContents("h", [0, 0, 5, 0, 0]), "linear").contents(), [0, 0, 5, 0, 0]);
  assert.deepEqual(fillHoles(withContents("h", [0, 0, 0]), "linear").contents(), [0, 0, 0]);
});

test("makeHistograms builds one normalised histogram per column", () => {
  const table = FeatureTable.fromRows([
    { "pT_{j_{1}}(GeV)": 50, "Mass_{j_{1}}(GeV)": 4 },
    { "pT_{j_{1}}(GeV)": 145, "Mass_{j_{1}}(GeV)": 8 },
    { "pT_{j_{1}}(GeV)": 140 },
  ]);
  const histograms = makeHistograms(table);
  assert.deepEqual(Object.keys(histograms), ["pT_{j_{1}}(GeV)", "Mass_{j_{1}}(GeV)"]);

  const pt = histograms["pT_{j_{1}}(GeV)"];
  assert.deepEqual(pt.binning, { nbins: 160, low: 0, high: 2000 });
  assert.ok(Math.abs(pt.integral() - 1) < 1e-12);
  assert.ok(Math.abs(pt.binContent(5) - 1 / 3) < 1e-12);
  assert.ok(Math.abs(pt.binContent(12) - 2 / 3) < 1e-12);

  const mass = histograms["Mass_{j_{1}}(GeV)"];
  assert.deepEqual(mass.binning, { nbins: 2, low: 4, high: 8 });
  assert.deepEqual(mass.contents(), [0.5, 0.5]);
});

test("makeHistograms honours custom binning and raw counts", () => {
  const table = FeatureTable.fromRows([{ "#eta_{e}": 0.2 }, { "#eta_{e}": -0.2 }]);
  const histograms = makeHistograms(table, {
    integral: null,
    binsByLabel: { "#eta_": { nbins: 2, low: -1, high: 1 } },
  });
  assert.deepEqual(histograms["#eta_{e}"].contents(), [1, 1]);
});

test("reviewHoles lists histograms with at least one empty bin", () => {
  const holes = reviewHoles({
    full: withContents("full", [1, 2]),
    gap: withContents("gap", [1, 0]),
  });
  assert.deepEqual(holes, ["gap"]);
});
