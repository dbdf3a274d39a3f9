import { wrapAngle } from "../common/math.js";

// Pseudorapidity reported for vectors along the beam axis.
const BEAM_AXIS_ETA = 1e11;

// pt * sinh(eta); pz is 0 when pt is 0, since the beam-axis eta cannot be inverted.
function longitudinal(absPt: number, eta: number): number {
  return absPt === 0 ? 0 : absPt * Math.sinh(eta);
}

/**
 * Relativistic four-momentum stored as cartesian components.
 * Collider coordinates (pt, eta, phi, m) are derived on demand.
 */
export class FourVector {
  readonly px: number;
  readonly py: number;
  readonly pz: number;
  readonly e: number;

  private constructor(px: number, py: number, pz: number, e: number) {
    this.px = px;
    this.py = py;
    this.pz = pz;
    this.e = e;
  }

  static fromPxPyPzE(px: number, py: number, pz: number, e: number): FourVector {
    return new FourVector(px, py, pz, e);
  }

  static fromPtEtaPhiM(pt: number, eta: number, phi: number, m: number): FourVector {
    const absPt = Math.abs(pt);
    const px = absPt * Math.cos(phi);
    const py = absPt * Math.sin(phi);
    const pz = longitudinal(absPt, eta);
    const p2 = px * px + py * py + pz * pz;
    const e = m >= 0 ? Math.sqrt(p2 + m * m) : Math.sqrt(Math.max(p2 - m * m, 0));
    return new FourVector(px, py, pz, e);
  }

  static fromPtEtaPhiE(pt: number, eta: number, phi: number, e: number): FourVector {
    const absPt = Math.abs(pt);
    return new FourVector(
      absPt * Math.cos(phi),
      absPt * Math.sin(phi),
      longitudinal(absPt, eta),
      e,
    );
  }

  static zero(): FourVector {
    return new FourVector(0, 0, 0, 0);
  }

  get pt(): number {
    return Math.hypot(this.px, this.py);
  }

  get p(): number {
    return Math.hypot(this.px, this.py, this.pz);
  }

  get pl(): number {
    const p = this.p;
    const pt = this.pt;
    return Math.sign(this.pz) * Math.sqrt(Math.max((p - pt) * (p + pt), 0));
  }

  get eta(): number {
    const pt = this.pt;
    if (pt === 0) {
      if (this.pz === 0) {
        return 0;
      }
      return this.pz > 0 ? BEAM_AXIS_ETA : -BEAM_AXIS_ETA;
    }
    return Math.asinh(this.pz / pt);
  }

  get phi(): number {
    if (this.px === 0 && this.py === 0) {
      return 0;
    }
    const phi = Math.atan2(this.py, this.px);
    return phi === -Math.PI ? Math.PI : phi;
  }

  get m2(): number {
    const p = this.p;
    return (this.e - p) * (this.e + p);
  }

  get m(): number {
    const m2 = this.m2;
    return m2 < 0 ? -Math.sqrt(-m2) : Math.sqrt(m2);
  }

  get energy(): number {
    return this.e;
  }

  add(other: FourVector): FourVector {
    return new FourVector(
      this.px + other.px,
      this.py + other.py,
      this.pz + other.pz,
      this.e + other.e,
    );
  }
}

export function deltaEta(a: FourVector, b: FourVector): number {
  return a.eta - b.eta;
}

export function deltaPhi(a: FourVector, b: FourVector): number {
  return wrapAngle(a.phi - b.phi);
}

export function deltaR(a: FourVector, b: FourVector): number {
  return Math.hypot(deltaEta(a, b), deltaPhi(a, b));
}

export function deltaPtScalar(a: FourVector, b: FourVector): number {
  return a.pt - b.pt;
}

export function deltaPtVector(a: FourVector, b: FourVector): number {
  return Math.hypot(a.px - b.px, a.py - b.py);
}

export function deltaPVector(a: FourVector, b: FourVector): number {
  return Math.hypot(a.px - b.px, a.py - b.py, a.pz - b.pz);
}
