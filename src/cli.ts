#!/usr/bin/env node
import { readFile } from "node:fs/promises";
import { runAnalysis, type AnalysisOptions } from "./analysis.js";
import { InvalidArgumentError, stringifyError } from "./common/errors.js";
import { DEFAULT_CUTS, buildRunConfig, mergeCutConfig, parseCutConfig } from "./config.js";
import { rawEventsSchema, type RawEvent } from "./extract/rawEvent.js";
import { binningFromSamples } from "./histogram/binning.js";
import { buildHistogram } from "./histogram/engine.js";
import { createSeededRandom } from "./kinematics/tagging.js";
import { Logger } from "./logger.js";
import { significanceFromHistograms } from "./stats/significance.js";
import type { CutConfig } from "./types.js";

async function readJson(path: string): Promise<unknown> {
  const text = await readFile(path, "utf8");
  return JSON.parse(text);
}

async function readEvents(path: string): Promise<RawEvent[]> {
  return rawEventsSchema.parse(await readJson(path));
}

async function readCuts(path?: string): Promise<CutConfig> {
  if (!path) {
    return DEFAULT_CUTS;
  }
  return mergeCutConfig(parseCutConfig(await readJson(path)));
}

async function main(): Promise<void> {
  const config = buildRunConfig(process.argv.slice(2), process.env);
  const logger = new Logger({ debugEnabled: config.debug });
  const options: AnalysisOptions = {
    cuts: await readCuts(config.cutsPath),
    leadingLeptons: config.leadingLeptons,
    leadingJets: config.leadingJets,
    leadingPhotons: config.leadingPhotons,
    includeMet: config.includeMet,
    minDeltaR: config.minDeltaR,
    integral: config.integral,
    random: createSeededRandom(config.seed),
  };

  const signal = runAnalysis(await readEvents(config.inputPath), options, logger.child("signal"));
  process.stdout.write(
    `Finished. processed=${signal.summary.processedEvents} selected=${signal.summary.selectedEvents} ` +
      `skipped=${signal.summary.skippedEvents} features=${signal.table.columns.length}\n`,
  );

  if (!config.backgroundPath || !config.feature) {
    return;
  }

  const background = runAnalysis(
    await readEvents(config.backgroundPath),
    { ...options, random: createSeededRandom(`${config.seed}:background`) },
    logger.child("background"),
  );
  const feature = config.feature;
  if (!signal.table.hasColumn(feature) || !background.table.hasColumn(feature)) {
    throw new InvalidArgumentError(`feature ${feature} is missing from the signal or background table`);
  }
  const sigSamples = signal.table.column(feature).filter((value) => !Number.isNaN(value));
  const bkgSamples = background.table.column(feature).filter((value) => !Number.isNaN(value));
  // Shared binning over both samples.
  const binning = binningFromSamples([...sigSamples, ...bkgSamples]);
  const significance = significanceFromHistograms(
    buildHistogram(sigSamples, binning, { name: `sig:${feature}`, integral: null }),
    buildHistogram(bkgSamples, binning, { name: `bkg:${feature}`, integral: null }),
  );
  process.stdout.write(`Significance ${feature}: ${significance.toFixed(4)}\n`);
}

main().catch((error) => {
  process.stderr.write(`Fatal error: ${stringifyError(error)}\n`);
  process.exit(1);
});
