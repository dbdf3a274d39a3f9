export const PARTICLE_CATEGORIES = [
  "electron",
  "muon",
  "lepton",
  "light_jet",
  "b_jet",
  "tau_jet",
  "other_jet",
  "photon",
  "met",
  "generic",
] as const;

export type ParticleCategory = (typeof PARTICLE_CATEGORIES)[number];

export type ValidTag = 0 | 1;

/** Bounds on a particle's `isolation` extra; `max` absent means no upper bound. */
export interface IsolationCut {
  min: number;
  max?: number;
}

export interface KinematicCut {
  ptMin: number;
  ptMax?: number;
  etaMin: number;
  etaMax: number;
  isolation?: IsolationCut;
}

export type CutConfig = Partial<Record<ParticleCategory, KinematicCut>>;

export type FeatureRow = Record<string, number>;

export interface HistogramBinning {
  nbins: number;
  low: number;
  high: number;
}

export type FillHolesMode = "constant" | "linear";

/** Uniform draw in [0, 1). */
export type RandomSource = () => number;

export interface AnalysisSummary {
  processedEvents: number;
  selectedEvents: number;
  skippedEvents: number;
  skipReasons: Record<string, number>;
}

export interface RunConfig {
  inputPath: string;
  backgroundPath?: string;
  cutsPath?: string;
  feature?: string;
  leadingLeptons: number;
  leadingJets: number;
  leadingPhotons: number;
  includeMet: boolean;
  minDeltaR?: number;
  integral: number;
  seed: string;
  debug: boolean;
}

export function isParticleCategory(value: unknown): value is ParticleCategory {
  return PARTICLE_CATEGORIES.some((category) => category === value);
}
