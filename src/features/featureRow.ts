import { InvalidArgumentError } from "../common/errors.js";
import { isParticle, type Particle } from "../kinematics/particle.js";
import type { FeatureRow } from "../types.js";

export const KINEMATIC_FEATURES = ["pt", "eta", "phi", "energy", "mass"] as const;
export const DELTA_FEATURES = [
  "deltaR",
  "deltaEta",
  "deltaPhi",
  "deltaPtScalar",
  "deltaPtVector",
  "deltaPVector",
] as const;

export type KinematicFeature = (typeof KINEMATIC_FEATURES)[number];
export type DeltaFeature = (typeof DELTA_FEATURES)[number];

export function kinematicLabel(feature: KinematicFeature, name: string): string {
  switch (feature) {
    case "pt":
      return `pT_{${name}}(GeV)`;
    case "eta":
      return `#eta_{${name}}`;
    case "phi":
      return `#phi_{${name}}`;
    case "energy":
      return `Energy_{${name}}(GeV)`;
    case "mass":
      return `Mass_{${name}}(GeV)`;
  }
}

export function deltaLabel(feature: DeltaFeature, name: string, otherName: string): string {
  const suffix = `_{${name}${otherName}}`;
  switch (feature) {
    case "deltaR":
      return `#Delta{R}${suffix}`;
    case "deltaEta":
      return `#Delta{#eta}${suffix}`;
    case "deltaPhi":
      return `#Delta{#phi}${suffix}`;
    case "deltaPtScalar":
      return `#Delta{pT}${suffix}(GeV)`;
    case "deltaPtVector":
      return `#Delta{#vec{pT}}${suffix}(GeV)`;
    case "deltaPVector":
      return `#Delta{#vec{p}}${suffix}(GeV)`;
  }
}

function kinematicValue(particle: Particle, feature: KinematicFeature): number {
  switch (feature) {
    case "pt":
      return particle.pt;
    case "eta":
      return particle.eta;
    case "phi":
      return particle.phi;
    case "energy":
      return particle.energy;
    case "mass":
      return particle.m;
  }
}

function deltaValue(particle: Particle, other: Particle, feature: DeltaFeature): number {
  switch (feature) {
    case "deltaR":
      return particle.deltaR(other);
    case "deltaEta":
      return particle.deltaEta(other);
    case "deltaPhi":
      return particle.deltaPhi(other);
    case "deltaPtScalar":
      return particle.deltaPtScalar(other);
    case "deltaPtVector":
      return particle.deltaPtVector(other);
    case "deltaPVector":
      return particle.deltaPVector(other);
  }
}

/**
 * Flattens an ordered particle list into labelled kinematic features.
 *
 * Labels follow the input order: the five kinematic values of particle `i`,
 * then its deltas against every later particle `j > i`, then particle `i + 1`.
 * Particle names must be unique within one call; they are not checked.
 */
export function buildFeatureRow(particles: readonly Particle[]): FeatureRow {
  if (!Array.isArray(particles)) {
    throw new InvalidArgumentError("particles must be a list of Particle objects");
  }
  if (particles.length === 0) {
    throw new InvalidArgumentError("particles must contain at least one Particle");
  }
  if (!particles.every((particle) => isParticle(particle))) {
    throw new InvalidArgumentError("particles must be a list of Particle objects");
  }

  const row: FeatureRow = {};
  for (let i = 0; i < particles.length; i += 1) {
    const particle = particles[i];
    for (const feature of KINEMATIC_FEATURES) {
      row[kinematicLabel(feature, particle.name)] = kinematicValue(particle, feature);
    }
    for (let j = i + 1; j < particles.length; j += 1) {
      const other = particles[j];
      for (const feature of DELTA_FEATURES) {
        row[deltaLabel(feature, particle.name, other.name)] = deltaValue(particle, other, feature);
      }
    }
  }
  return row;
}
