import type { Particle } from "../kinematics/particle.js";
import type { FeatureRow } from "../types.js";

export const MET_LABEL = "MET(GeV)";
export const ST_LABEL = "sT(GeV)";
export const MT_LABEL = "mT(GeV)";

export function scalarSumPt(particles: readonly Particle[]): number {
  let total = 0;
  for (const particle of particles) {
    total += particle.pt;
  }
  return total;
}

export function transverseMass(visible: Particle, met: Particle): number {
  const value = 2 * visible.pt * met.pt * (1 - Math.cos(visible.deltaPhi(met)));
  return Math.sqrt(Math.max(value, 0));
}

/**
 * Event-level scalars appended after the per-particle features:
 * MET, the scalar pt sum of every selected object, and the transverse mass
 * of the leading lepton with MET.
 */
export function buildEventFeatures(
  selected: readonly Particle[],
  met: Particle | undefined,
  leadingLepton: Particle | undefined,
): FeatureRow {
  const row: FeatureRow = {};
  if (met) {
    row[MET_LABEL] = met.pt;
  }
  row[ST_LABEL] = scalarSumPt(met ? [...selected, met] : selected);
  if (met && leadingLepton) {
    row[MT_LABEL] = transverseMass(leadingLepton, met);
  }
  return row;
}
