import { InvalidArgumentError } from "../common/errors.js";
import type { ParticleCategory, RandomSource, ValidTag } from "../types.js";

// 70% working point of the MV2c10 tagger.
export const DEFAULT_B_TAG_THRESHOLD = 0.8244273;

export const CHARM_FLAVOR = 4;

export interface CharmTagRates {
  efficiency: number;
  misidRate: number;
}

export const DEFAULT_CHARM_TAG_RATES: Readonly<CharmTagRates> = {
  efficiency: 0.7,
  misidRate: 0.01,
};

const JET_CATEGORIES: Readonly<Record<string, ParticleCategory>> = {
  BTag0_TauTag0: "light_jet",
  BTag1_TauTag0: "b_jet",
  BTag0_TauTag1: "tau_jet",
};

export function jetCategory(bTag: number, tauTag: number): ParticleCategory {
  return JET_CATEGORIES[`BTag${bTag}_TauTag${tauTag}`] ?? "other_jet";
}

export function leptonCategory(typeCode: number): ParticleCategory {
  switch (Math.abs(typeCode)) {
    case 11:
      return "electron";
    case 13:
      return "muon";
    default:
      return "lepton";
  }
}

export function bTagFromDiscriminant(score: number, threshold = DEFAULT_B_TAG_THRESHOLD): ValidTag {
  return score > threshold ? 1 : 0;
}

export function charmTag(
  flavor: number,
  random: RandomSource,
  rates: CharmTagRates = DEFAULT_CHARM_TAG_RATES,
): ValidTag {
  const draw = random();
  if (flavor === CHARM_FLAVOR) {
    return draw < rates.efficiency ? 1 : 0;
  }
  return draw < rates.misidRate ? 1 : 0;
}

export function chargeFromPdgId(pdgId: number): number {
  if (!Number.isInteger(pdgId)) {
    throw new InvalidArgumentError(`pdg id must be an integer, got ${pdgId}`);
  }
  const sign = Math.sign(pdgId);
  switch (Math.abs(pdgId)) {
    case 2:
    case 4:
    case 6:
      return (sign * 2) / 3;
    case 1:
    case 3:
    case 5:
      return -sign / 3;
    case 11:
    case 13:
    case 15:
      return -sign;
    default:
      return 0;
  }
}

export function categoryFromPdgId(pdgId: number): ParticleCategory {
  switch (Math.abs(pdgId)) {
    case 11:
      return "electron";
    case 13:
      return "muon";
    case 15:
      return "lepton";
    case 22:
      return "photon";
    default:
      return "generic";
  }
}

function stableHash(input: string): number {
  let hash = 2166136261;
  for (let index = 0; index < input.length; index += 1) {
    hash ^= input.charCodeAt(index);
    hash = Math.imul(hash, 16777619);
  }
  return hash >>> 0;
}

/** Deterministic mulberry32 stream seeded from an FNV-1a hash of `seed`. */
export function createSeededRandom(seed: string): RandomSource {
  let state = stableHash(seed);
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
