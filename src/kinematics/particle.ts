import { InvalidArgumentError, MissingConfigurationError } from "../common/errors.js";
import { isFiniteNumber } from "../common/math.js";
import {
  isParticleCategory,
  type CutConfig,
  type IsolationCut,
  type KinematicCut,
  type ParticleCategory,
  type ValidTag,
} from "../types.js";
import {
  FourVector,
  deltaEta,
  deltaPVector,
  deltaPhi,
  deltaPtScalar,
  deltaPtVector,
  deltaR,
} from "./fourVector.js";
import { categoryFromPdgId, chargeFromPdgId } from "./tagging.js";

export interface ParticleInit {
  vector: FourVector;
  charge?: number;
  name?: string;
  category?: ParticleCategory;
  extras?: Readonly<Record<string, number>>;
}

export interface MissingEnergyContribution {
  met: number;
  phi: number;
}

export class Particle {
  readonly vector: FourVector;
  readonly charge: number;
  readonly category: ParticleCategory;
  /** Category-specific attributes: isolation, track count, tagging flags. */
  readonly extras: Readonly<Record<string, number>>;
  private displayName: string;
  private tag: ValidTag | undefined;

  constructor(init: ParticleInit) {
    if (!(init.vector instanceof FourVector)) {
      throw new InvalidArgumentError("vector must be a FourVector");
    }
    const charge = init.charge ?? 0;
    if (typeof charge !== "number" || Number.isNaN(charge)) {
      throw new InvalidArgumentError("charge must be a number");
    }
    const name = init.name ?? "";
    if (typeof name !== "string") {
      throw new InvalidArgumentError("name must be a string");
    }
    const category: unknown = init.category ?? "generic";
    if (typeof category !== "string") {
      throw new InvalidArgumentError("category must be a string");
    }
    if (!isParticleCategory(category)) {
      throw new InvalidArgumentError(`unknown particle category: ${category}`);
    }
    this.vector = init.vector;
    this.charge = charge;
    this.displayName = name;
    this.category = category;
    this.extras = Object.freeze({ ...init.extras });
    this.tag = undefined;
  }

  static missingEnergy(
    contributions: readonly MissingEnergyContribution[],
    name = "MET",
  ): Particle {
    let vector = FourVector.zero();
    for (const contribution of contributions) {
      // eta = 0 keeps every contribution in the transverse plane.
      vector = vector.add(FourVector.fromPtEtaPhiM(contribution.met, 0, contribution.phi, 0));
    }
    return new Particle({ vector, charge: 0, name, category: "met" });
  }

  static fromPdg(
    pdgId: number,
    vector: FourVector,
    extras: Readonly<Record<string, number>> = {},
  ): Particle {
    return new Particle({
      vector,
      charge: chargeFromPdgId(pdgId),
      name: String(pdgId),
      category: categoryFromPdgId(pdgId),
      extras: { ...extras, pdgId },
    });
  }

  get name(): string {
    return this.displayName;
  }

  rename(name: string): void {
    if (typeof name !== "string") {
      throw new InvalidArgumentError("name must be a string");
    }
    this.displayName = name;
  }

  get validTag(): ValidTag | undefined {
    return this.tag;
  }

  setValidTag(value: number): void {
    if (value !== 0 && value !== 1) {
      throw new InvalidArgumentError(`valid tag must be 0 or 1, got ${value}`);
    }
    this.tag = value;
  }

  evaluateValidTag(cuts: CutConfig): ValidTag {
    const cut = cuts[this.category];
    if (!cut) {
      throw new MissingConfigurationError(`no kinematic cut configured for ${this.category}`);
    }
    assertCutBounds(this.category, cut);

    const pt = this.pt;
    const eta = this.eta;
    const ptOk = pt >= cut.ptMin && (cut.ptMax === undefined || pt <= cut.ptMax);
    const etaOk = eta >= cut.etaMin && eta <= cut.etaMax;
    const tag: ValidTag = ptOk && etaOk && this.passesIsolation(cut.isolation) ? 1 : 0;
    this.setValidTag(tag);
    return tag;
  }

  // A particle without an isolation value fails any isolation cut.
  private passesIsolation(cut: IsolationCut | undefined): boolean {
    if (!cut) {
      return true;
    }
    const isolation = this.extras.isolation;
    if (isolation === undefined || Number.isNaN(isolation)) {
      return false;
    }
    return isolation >= cut.min && (cut.max === undefined || isolation <= cut.max);
  }

  get pt(): number {
    return this.vector.pt;
  }

  get p(): number {
    return this.vector.p;
  }

  get pl(): number {
    return this.vector.pl;
  }

  get eta(): number {
    return this.vector.eta;
  }

  get phi(): number {
    return this.vector.phi;
  }

  get m(): number {
    return this.vector.m;
  }

  get energy(): number {
    return this.vector.energy;
  }

  deltaR(other: Particle): number {
    return deltaR(this.vector, other.vector);
  }

  deltaEta(other: Particle): number {
    return deltaEta(this.vector, other.vector);
  }

  deltaPhi(other: Particle): number {
    return deltaPhi(this.vector, other.vector);
  }

  deltaPtScalar(other: Particle): number {
    return deltaPtScalar(this.vector, other.vector);
  }

  deltaPtVector(other: Particle): number {
    return deltaPtVector(this.vector, other.vector);
  }

  deltaPVector(other: Particle): number {
    return deltaPVector(this.vector, other.vector);
  }
}

export function isParticle(value: unknown): value is Particle {
  return value instanceof Particle;
}

export function assertCutBounds(category: string, cut: KinematicCut): void {
  if (!isFiniteNumber(cut.ptMin) || !isFiniteNumber(cut.etaMin) || !isFiniteNumber(cut.etaMax)) {
    throw new InvalidArgumentError(`cut for ${category} must have finite ptMin, etaMin and etaMax`);
  }
  if (cut.ptMax !== undefined && !(cut.ptMax > cut.ptMin)) {
    throw new InvalidArgumentError(
      `cut for ${category}: ptMax (${cut.ptMax}) must be greater than ptMin (${cut.ptMin})`,
    );
  }
  const isolation = cut.isolation;
  if (isolation === undefined) {
    return;
  }
  if (!isFiniteNumber(isolation.min)) {
    throw new InvalidArgumentError(`cut for ${category}: isolation min must be finite`);
  }
  if (isolation.max !== undefined && !(isolation.max > isolation.min)) {
    throw new InvalidArgumentError(
      `cut for ${category}: isolation max (${isolation.max}) must be greater than min (${isolation.min})`,
    );
  }
}
