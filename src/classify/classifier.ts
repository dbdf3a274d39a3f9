import { InvalidArgumentError } from "../common/errors.js";
import type { Particle } from "../kinematics/particle.js";
import type { CutConfig, ParticleCategory } from "../types.js";

export type ParticleGroups = Record<string, Particle[]>;

export const DEFAULT_MIN_DELTA_R = 0.3;

export const LEPTON_CATEGORIES: readonly ParticleCategory[] = ["electron", "muon", "lepton"];

export const DISPLAY_PREFIXES: Readonly<Record<ParticleCategory, string>> = {
  electron: "e",
  muon: "#mu",
  lepton: "lep",
  light_jet: "j",
  b_jet: "b",
  tau_jet: "#tau",
  other_jet: "oj",
  photon: "#gamma",
  met: "MET",
  generic: "p",
};

export interface SelectionOptions {
  /** Merge electrons, muons and generic leptons into one `lepton` group. */
  mergeLeptons?: boolean;
  /** Overlap removal across every kept particle; disabled when undefined. */
  minDeltaR?: number;
}

/** Stable descending-pt order; ties keep their input order. */
export function sortByPt(particles: readonly Particle[]): Particle[] {
  return particles
    .map((particle, index) => ({ particle, index }))
    .sort((a, b) => {
      if (a.particle.pt !== b.particle.pt) {
        return b.particle.pt - a.particle.pt;
      }
      return a.index - b.index;
    })
    .map((entry) => entry.particle);
}

/**
 * Tags every particle against the cut of its own category and keeps the
 * passing ones, group by group. Fails on the first particle whose category
 * has no cut.
 */
export function classify(groups: Readonly<ParticleGroups>, cuts: CutConfig): ParticleGroups {
  const out: ParticleGroups = {};
  for (const [key, particles] of Object.entries(groups)) {
    const kept: Particle[] = [];
    for (const particle of particles) {
      if (particle.evaluateValidTag(cuts) === 1) {
        kept.push(particle);
      }
    }
    out[key] = sortByPt(kept);
  }
  return out;
}

export function unify(groups: Readonly<ParticleGroups>): { all: Particle[] } {
  const merged: Particle[] = [];
  for (const particles of Object.values(groups)) {
    merged.push(...particles);
  }
  return { all: sortByPt(merged) };
}

export function removeOverlaps(
  particles: readonly Particle[],
  minDeltaR = DEFAULT_MIN_DELTA_R,
): Particle[] {
  if (!(minDeltaR >= 0)) {
    throw new InvalidArgumentError(`minDeltaR must be non-negative, got ${minDeltaR}`);
  }
  const kept: Particle[] = [];
  for (const particle of particles) {
    if (kept.every((other) => particle.deltaR(other) >= minDeltaR)) {
      kept.push(particle);
    }
  }
  return kept;
}

export function assignRankedNames(particles: readonly Particle[], prefix: string): void {
  particles.forEach((particle, index) => {
    particle.rename(`${prefix}_{${index + 1}}`);
  });
}

export function selectGoodParticles(
  groups: Readonly<ParticleGroups>,
  cuts: CutConfig,
  options: SelectionOptions = {},
): ParticleGroups {
  const good = classify(groups, cuts);
  const selected: ParticleGroups = {};

  if (options.mergeLeptons ?? true) {
    const leptonGroups: ParticleGroups = {};
    for (const [key, particles] of Object.entries(good)) {
      if (isLeptonGroup(particles, key)) {
        leptonGroups[key] = particles;
      } else {
        selected[key] = particles;
      }
    }
    if (Object.keys(leptonGroups).length > 0) {
      selected.lepton = unify(leptonGroups).all;
    }
  } else {
    Object.assign(selected, good);
  }

  if (options.minDeltaR !== undefined) {
    const survivors = new Set(removeOverlaps(unify(selected).all, options.minDeltaR));
    for (const key of Object.keys(selected)) {
      selected[key] = selected[key].filter((particle) => survivors.has(particle));
    }
  }

  for (const [key, particles] of Object.entries(selected)) {
    assignRankedNames(particles, groupPrefix(key, particles));
  }
  return selected;
}

function isLeptonGroup(particles: readonly Particle[], key: string): boolean {
  if (LEPTON_CATEGORIES.some((category) => category === key)) {
    return true;
  }
  return particles.length > 0 && particles.every((particle) => LEPTON_CATEGORIES.includes(particle.category));
}

function groupPrefix(key: string, particles: readonly Particle[]): string {
  const known = Object.entries(DISPLAY_PREFIXES).find(([category]) => category === key);
  if (known) {
    return known[1];
  }
  return particles.length > 0 ? DISPLAY_PREFIXES[particles[0].category] : key;
}
