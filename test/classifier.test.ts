import test from "node:test";
import assert from "node:assert/strict";
import {
  assignRankedNames,
  classify,
  removeOverlaps,
  selectGoodParticles,
  sortByPt,
  unify,
} from "../src/classify/classifier.js";
import { InvalidArgumentError, MissingConfigurationError } from "../src/common/errors.js";
import { FourVector } from "../src/kinematics/fourVector.js";
import { Particle } from "../src/kinematics/particle.js";
import type { CutConfig, ParticleCategory } from "../src/types.js";

function make(
  category: ParticleCategory,
  name: string,
  pt: number,
  eta = 0,
  phi = 0,
): Particle {
  return new Particle({ vector: FourVector.fromPtEtaPhiM(pt, eta, phi, 0), name, category });
}

const CUTS: CutConfig = {
  electron: { ptMin: 20, etaMin: -2.5, etaMax: 2.5 },
  muon: { ptMin: 20, ptMax: 200, etaMin: -2.4, etaMax: 2.4 },
  light_jet: { ptMin: 30, etaMin: -4.5, etaMax: 4.5 },
  b_jet: { ptMin: 30, etaMin: -2.5, etaMax: 2.5 },
};

test("classify keeps only passing particles in descending pt", () => {
  const failing = make("electron", "e_low", 10);
  const groups = {
    electron: [make("electron", "e_mid", 40), failing, make("electron", "e_high", 90, 1.0)],
    muon: [make("muon", "mu_over", 250), make("muon", "mu_ok", 150, -1.0), make("muon", "mu_eta", 50, 2.45)],
  };
  const good = classify(groups, CUTS);
  assert.deepEqual(Object.keys(good), ["electron", "muon"]);
  assert.deepEqual(good.electron.map((p) => p.name), ["e_high", "e_mid"]);
  assert.deepEqual(good.muon.map((p) => p.name), ["mu_ok"]);
  assert.equal(failing.validTag, 0);
  assert.equal(good.electron[0].validTag, 1);

  for (const [key, particles] of Object.entries(good)) {
    const cut = key === "electron" ? CUTS.electron : CUTS.muon;
    if (!cut) {
      throw new Error(`missing cut for ${key}`);
    }
    for (let i = 0; i < particles.length; i += 1) {
      const particle = particles[i];
      assert.ok(particle.pt >= cut.ptMin);
      assert.ok(cut.ptMax === undefined || particle.pt <= cut.ptMax);
      assert.ok(particle.eta >= cut.etaMin && particle.eta <= cut.etaMax);
      if (i > 0) {
        assert.ok(particles[i - 1].pt >= particle.pt);
      }
    }
  }
});

test("classify fails fast when a category has no cut", () => {
  const groups = { photon: [make("photon", "g", 50)] };
  assert.throws(() => classify(groups, CUTS), MissingConfigurationError);
});

test("classify looks cuts up by particle category, not group key", () => {
  const groups = { leptons: [make("electron", "e", 25), make("muon", "mu", 15)] };
  const good = classify(groups, CUTS);
  assert.deepEqual(good.leptons.map((p) => p.name), ["e"]);
});

function photon(name: string, isolation?: number): Particle {
  return new Particle({
    vector: FourVector.fromPtEtaPhiM(50, 0, 0, 0),
    name,
    category: "photon",
    extras: isolation === undefined ? {} : { isolation },
  });
}

test("classify applies isolation bounds inclusively", () => {
  const cuts: CutConfig = {
    photon: { ptMin: 10, etaMin: -2.5, etaMax: 2.5, isolation: { min: 0, max: 0.1 } },
  };
  const groups = {
    photon: [photon("tight", 0.05), photon("edge", 0.1), photon("loose", 5), photon("bare")],
  };
  const good = classify(groups, cuts);
  assert.deepEqual(good.photon.map((particle) => particle.name), ["tight", "edge"]);
  assert.deepEqual(
    groups.photon.map((particle) => particle.validTag),
    [1, 1, 0, 0],
  );
});

test("classify treats a missing isolation max as an open upper bound", () => {
  const cuts: CutConfig = {
    photon: { ptMin: 10, etaMin: -2.5, etaMax: 2.5, isolation: { min: 0.2 } },
  };
  const good = classify({ photon: [photon("a", 0.1), photon("b", 0.2), photon("c", 1000)] }, cuts);
  assert.deepEqual(good.photon.map((particle) => particle.name), ["b", "c"]);
});

test("classify rejects an isolation max not above its min", () => {
  const cuts: CutConfig = {
    photon: { ptMin: 10, etaMin: -2.5, etaMax: 2.5, isolation: { min: 0.5, max: 0.5 } },
  };
  const subject = photon("a", 0.5);
  assert.throws(() => classify({ photon: [subject] }, cuts), InvalidArgumentError);
  assert.equal(subject.validTag, undefined);
});

test("unify merges every group into one pt-ordered list", () => {
  const electrons = [make("electron", "e1", 70), make("electron", "e2", 20)];
  const muons = [make("muon", "m1", 45)];
  const unified = unify({ electron: electrons, muon: muons });
  assert.deepEqual(Object.keys(unified), ["all"]);
  assert.deepEqual(unified.all.map((p) => p.name), ["e1", "m1", "e2"]);
});

test("unify keeps ties in group then list order", () => {
  const unified = unify({
    muon: [make("muon", "m", 30)],
    electron: [make("electron", "e", 30)],
  });
  assert.deepEqual(unified.all.map((p) => p.name), ["m", "e"]);
});

test("unify of empty groups is an empty list", () => {
  assert.deepEqual(unify({}), { all: [] });
  assert.deepEqual(unify({ electron: [], muon: [] }), { all: [] });
});

test("sortByPt is stable on ties", () => {
  const sorted = sortByPt([make("generic", "a", 10), make("generic", "b", 20), make("generic", "c", 10)]);
  assert.deepEqual(sorted.map((p) => p.name), ["b", "a", "c"]);
});

test("removeOverlaps drops later particles inside the cone", () => {
  const leading = make("light_jet", "j1", 100, 0, 0);
  const close = make("electron", "e1", 50, 0.1, 0.1);
  const far = make("muon", "m1", 40, 1.0, 2.0);
  const kept = removeOverlaps([leading, close, far]);
  assert.deepEqual(kept.map((p) => p.name), ["j1", "m1"]);
  assert.equal(removeOverlaps([leading, close], 0.1).length, 2);
});

test("assignRankedNames numbers particles from one", () => {
  const particles = [make("light_jet", "x", 90), make("light_jet", "y", 50)];
  assignRankedNames(particles, "j");
  assert.deepEqual(particles.map((p) => p.name), ["j_{1}", "j_{2}"]);
});

test("selectGoodParticles merges leptons and ranks names per group", () => {
  const groups = {
    electron: [make("electron", "e_0", 35, 0.5, 0.2)],
    muon: [make("muon", "mu_0", 60, -0.3, 1.5), make("muon", "mu_1", 12, 0.1, -1.0)],
    light_jet: [make("light_jet", "l_jet_0", 120, 1.2, -2.0), make("light_jet", "l_jet_1", 25, 0, 0)],
    b_jet: [make("b_jet", "b_jet_0", 80, -1.5, 3.0)],
  };
  const good = selectGoodParticles(groups, CUTS);
  assert.deepEqual(Object.keys(good).sort(), ["b_jet", "lepton", "light_jet"]);
  assert.deepEqual(good.lepton.map((p) => p.name), ["lep_{1}", "lep_{2}"]);
  assert.deepEqual(good.lepton.map((p) => p.category), ["muon", "electron"]);
  assert.deepEqual(good.light_jet.map((p) => p.name), ["j_{1}"]);
  assert.deepEqual(good.b_jet.map((p) => p.name), ["b_{1}"]);
});

test("selectGoodParticles can keep lepton flavours apart", () => {
  const groups = {
    electron: [make("electron", "e_0", 35)],
    muon: [make("muon", "mu_0", 60, 0, 1.5)],
  };
  const good = selectGoodParticles(groups, CUTS, { mergeLeptons: false });
  assert.deepEqual(good.electron.map((p) => p.name), ["e_{1}"]);
  assert.deepEqual(good.muon.map((p) => p.name), ["#mu_{1}"]);
});

test("selectGoodParticles applies overlap removal across groups", () => {
  const groups = {
    electron: [make("electron", "e_0", 40, 0.05, 0.05)],
    light_jet: [make("light_jet", "l_jet_0", 100, 0, 0), make("light_jet", "l_jet_1", 60, 2, 2)],
  };
  const good = selectGoodParticles(groups, CUTS, { minDeltaR: 0.3 });
  assert.deepEqual(good.lepton, []);
  assert.deepEqual(good.light_jet.map((p) => p.name), ["j_{1}", "j_{2}"]);
});
