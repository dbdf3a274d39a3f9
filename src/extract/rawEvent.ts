import { z } from "zod";
import { MismatchedLengthError } from "../common/errors.js";
import { sortByPt, type ParticleGroups } from "../classify/classifier.js";
import { FourVector } from "../kinematics/fourVector.js";
import { Particle, type MissingEnergyContribution } from "../kinematics/particle.js";
import { charmTag, jetCategory, leptonCategory } from "../kinematics/tagging.js";
import type { RandomSource } from "../types.js";

const values = z.array(z.number());
const flags = z.array(z.number().int());

const jetsSchema = z.object({
  pt: values,
  eta: values,
  phi: values,
  mass: values,
  bTag: flags,
  tauTag: flags,
  flavor: flags.optional(),
  charge: values.optional(),
});

const leptonsSchema = z.object({
  pt: values,
  eta: values,
  phi: values,
  mass: values.optional(),
  charge: values,
  typeCode: flags.optional(),
});

const photonsSchema = z.object({
  pt: values,
  eta: values,
  phi: values,
  mass: values.optional(),
  isolation: values.optional(),
});

const tausSchema = z.object({
  pt: values,
  eta: values,
  phi: values,
  energy: values,
  charge: values,
  nTracks: flags.optional(),
});

const missingEtSchema = z.object({
  met: values,
  phi: values,
});

const generatedSchema = z.object({
  pdgId: flags,
  px: values,
  py: values,
  pz: values,
  energy: values,
  status: flags.optional(),
});

export const rawEventSchema = z.object({
  jets: jetsSchema.optional(),
  electrons: leptonsSchema.optional(),
  muons: leptonsSchema.optional(),
  leptons: leptonsSchema.optional(),
  photons: photonsSchema.optional(),
  taus: tausSchema.optional(),
  missingEt: missingEtSchema.optional(),
  generated: generatedSchema.optional(),
});

export const rawEventsSchema = z.array(rawEventSchema);

export type RawEvent = z.infer<typeof rawEventSchema>;

export interface BuildParticlesOptions {
  /** Enables probabilistic charm tagging of jets that carry a flavor. */
  random?: RandomSource;
}

export interface EventParticles {
  groups: ParticleGroups;
  met?: Particle;
}

// Generator status code of final-state particles.
const FINAL_STATE = 1;

function collectionSize(collection: string, columns: Record<string, readonly number[] | undefined>): number {
  let size: number | undefined;
  for (const [field, column] of Object.entries(columns)) {
    if (column === undefined) {
      continue;
    }
    if (size === undefined) {
      size = column.length;
    } else if (column.length !== size) {
      throw new MismatchedLengthError(
        `${collection}.${field} has ${column.length} entries, expected ${size}`,
      );
    }
  }
  return size ?? 0;
}

function pushTo(groups: ParticleGroups, key: string, particle: Particle): void {
  (groups[key] ??= []).push(particle);
}

function buildLeptons(
  groups: ParticleGroups,
  collection: string,
  leptons: z.infer<typeof leptonsSchema>,
  fallback: "electron" | "muon" | "lepton",
): void {
  const size = collectionSize(collection, leptons);
  for (let j = 0; j < size; j += 1) {
    const category = leptons.typeCode ? leptonCategory(leptons.typeCode[j]) : fallback;
    const prefix = category === "electron" ? "e" : category === "muon" ? "mu" : "lep";
    pushTo(
      groups,
      category,
      new Particle({
        vector: FourVector.fromPtEtaPhiM(leptons.pt[j], leptons.eta[j], leptons.phi[j], leptons.mass?.[j] ?? 0),
        charge: leptons.charge[j],
        name: `${prefix}_{${j}}`,
        category,
      }),
    );
  }
}

export function buildParticleGroups(
  event: RawEvent,
  options: BuildParticlesOptions = {},
): EventParticles {
  const groups: ParticleGroups = {};

  if (event.jets) {
    const jets = event.jets;
    const size = collectionSize("jets", jets);
    for (let j = 0; j < size; j += 1) {
      const category = jetCategory(jets.bTag[j], jets.tauTag[j]);
      const extras: Record<string, number> = { bTag: jets.bTag[j], tauTag: jets.tauTag[j] };
      if (jets.flavor) {
        extras.flavor = jets.flavor[j];
        if (options.random) {
          extras.cTag = charmTag(jets.flavor[j], options.random);
        }
      }
      pushTo(
        groups,
        category,
        new Particle({
          vector: FourVector.fromPtEtaPhiM(jets.pt[j], jets.eta[j], jets.phi[j], jets.mass[j]),
          charge: jets.charge?.[j] ?? 0,
          name: `${category}_{${j}}`,
          category,
          extras,
        }),
      );
    }
  }

  if (event.taus) {
    const taus = event.taus;
    const size = collectionSize("taus", taus);
    for (let j = 0; j < size; j += 1) {
      pushTo(
        groups,
        "tau_jet",
        new Particle({
          vector: FourVector.fromPtEtaPhiE(taus.pt[j], taus.eta[j], taus.phi[j], taus.energy[j]),
          charge: taus.charge[j],
          name: `tau_jet_{${j}}`,
          category: "tau_jet",
          extras: taus.nTracks ? { nTracks: taus.nTracks[j] } : {},
        }),
      );
    }
  }

  if (event.electrons) {
    buildLeptons(groups, "electrons", event.electrons, "electron");
  }
  if (event.muons) {
    buildLeptons(groups, "muons", event.muons, "muon");
  }
  if (event.leptons) {
    buildLeptons(groups, "leptons", event.leptons, "lepton");
  }

  if (event.photons) {
    const photons = event.photons;
    const size = collectionSize("photons", photons);
    for (let j = 0; j < size; j += 1) {
      pushTo(
        groups,
        "photon",
        new Particle({
          vector: FourVector.fromPtEtaPhiM(photons.pt[j], photons.eta[j], photons.phi[j], photons.mass?.[j] ?? 0),
          name: `photon_{${j}}`,
          category: "photon",
          extras: photons.isolation ? { isolation: photons.isolation[j] } : {},
        }),
      );
    }
  }

  if (event.generated) {
    const generated = event.generated;
    const size = collectionSize("generated", generated);
    for (let j = 0; j < size; j += 1) {
      if (generated.status && generated.status[j] !== FINAL_STATE) {
        continue;
      }
      const particle = Particle.fromPdg(
        generated.pdgId[j],
        FourVector.fromPxPyPzE(generated.px[j], generated.py[j], generated.pz[j], generated.energy[j]),
      );
      particle.rename(`${generated.pdgId[j]}_{${j}}`);
      pushTo(groups, particle.category, particle);
    }
  }

  for (const key of Object.keys(groups)) {
    groups[key] = sortByPt(groups[key]);
  }

  if (!event.missingEt) {
    return { groups };
  }
  const missingEt = event.missingEt;
  const size = collectionSize("missingEt", missingEt);
  const contributions: MissingEnergyContribution[] = [];
  for (let j = 0; j < size; j += 1) {
    contributions.push({ met: missingEt.met[j], phi: missingEt.phi[j] });
  }
  return { groups, met: Particle.missingEnergy(contributions) };
}
