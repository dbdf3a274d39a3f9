import { selectGoodParticles, unify, type ParticleGroups } from "./classify/classifier.js";
import { buildParticleGroups, type RawEvent } from "./extract/rawEvent.js";
import { buildEventFeatures } from "./features/eventFeatures.js";
import { buildFeatureRow } from "./features/featureRow.js";
import { FeatureTable } from "./features/featureTable.js";
import { makeHistograms, reviewHoles } from "./histogram/engine.js";
import type { Histogram } from "./histogram/histogram.js";
import type { Particle } from "./kinematics/particle.js";
import { Logger } from "./logger.js";
import type {
  AnalysisSummary,
  CutConfig,
  FeatureRow,
  HistogramBinning,
  RandomSource,
} from "./types.js";

export const JET_GROUPS = ["light_jet", "b_jet", "tau_jet", "other_jet"] as const;

export type SkipReason =
  | "insufficient_leptons"
  | "insufficient_jets"
  | "insufficient_photons"
  | "missing_met"
  | "no_particles";

export interface AnalysisOptions {
  cuts: CutConfig;
  leadingLeptons: number;
  leadingJets: number;
  leadingPhotons: number;
  includeMet: boolean;
  eventFeatures?: boolean;
  minDeltaR?: number;
  /** Target integral of every histogram; `null` keeps raw counts. */
  integral?: number | null;
  binsByLabel?: Readonly<Record<string, HistogramBinning>>;
  random?: RandomSource;
}

export interface EventSelection {
  particles: Particle[];
  row?: FeatureRow;
  skipReason?: SkipReason;
}

export interface AnalysisResult {
  summary: AnalysisSummary;
  table: FeatureTable;
  histograms: Record<string, Histogram>;
  histogramsWithHoles: string[];
}

function pick(groups: ParticleGroups, key: string, count: number): Particle[] | undefined {
  const particles = groups[key] ?? [];
  if (particles.length < count) {
    return undefined;
  }
  return particles.slice(0, count);
}

export function analyzeEvent(event: RawEvent, options: AnalysisOptions): EventSelection {
  const { groups, met } = buildParticleGroups(event, { random: options.random });
  const good = selectGoodParticles(groups, options.cuts, { minDeltaR: options.minDeltaR });

  const leptons = pick(good, "lepton", options.leadingLeptons);
  if (!leptons) {
    return { particles: [], skipReason: "insufficient_leptons" };
  }
  const jetGroups: ParticleGroups = {};
  for (const key of JET_GROUPS) {
    jetGroups[key] = good[key] ?? [];
  }
  const jets = pick(unify(jetGroups), "all", options.leadingJets);
  if (!jets) {
    return { particles: [], skipReason: "insufficient_jets" };
  }
  const photons = pick(good, "photon", options.leadingPhotons);
  if (!photons) {
    return { particles: [], skipReason: "insufficient_photons" };
  }
  if (options.includeMet && !met) {
    return { particles: [], skipReason: "missing_met" };
  }

  const visible = [...leptons, ...jets, ...photons];
  const particles = options.includeMet && met ? [...visible, met] : visible;
  if (particles.length === 0) {
    return { particles, skipReason: "no_particles" };
  }

  const row = buildFeatureRow(particles);
  if (options.eventFeatures ?? true) {
    Object.assign(
      row,
      buildEventFeatures(visible, options.includeMet ? met : undefined, leptons[0]),
    );
  }
  return { particles, row };
}

/**
 * Runs selection and feature extraction over every event, then histograms
 * each feature column. Fails on the first invalid event.
 */
export function runAnalysis(
  events: readonly RawEvent[],
  options: AnalysisOptions,
  logger: Logger = new Logger({ debugEnabled: false }),
): AnalysisResult {
  const summary: AnalysisSummary = {
    processedEvents: 0,
    selectedEvents: 0,
    skippedEvents: 0,
    skipReasons: {},
  };
  const table = new FeatureTable();

  logger.info(
    `Selection policy: leptons=${options.leadingLeptons}, jets=${options.leadingJets}, ` +
      `photons=${options.leadingPhotons}, met=${options.includeMet}, ` +
      `min_delta_r=${options.minDeltaR ?? "off"}`,
  );

  events.forEach((event, index) => {
    summary.processedEvents += 1;
    const selection = analyzeEvent(event, options);
    if (!selection.row) {
      const reason = selection.skipReason ?? "no_particles";
      summary.skippedEvents += 1;
      summary.skipReasons[reason] = (summary.skipReasons[reason] ?? 0) + 1;
      logger.debug(`Skipping event ${index}: ${reason}`);
      return;
    }
    table.append(selection.row);
    summary.selectedEvents += 1;
  });

  const histograms =
    table.size > 0
      ? makeHistograms(table, { integral: options.integral, binsByLabel: options.binsByLabel })
      : {};
  const histogramsWithHoles = reviewHoles(histograms);
  if (histogramsWithHoles.length > 0) {
    logger.warn(`Histograms with empty bins: ${histogramsWithHoles.length}/${Object.keys(histograms).length}`);
  }

  logger.info(
    `Run summary: processed=${summary.processedEvents}, selected=${summary.selectedEvents}, ` +
      `skipped=${summary.skippedEvents}, columns=${table.columns.length}`,
  );

  return { summary, table, histograms, histogramsWithHoles };
}
