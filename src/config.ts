import { z } from "zod";
import { InvalidArgumentError } from "./common/errors.js";
import { isParticleCategory, type CutConfig, type RunConfig } from "./types.js";

const isolationCutSchema = z
  .object({
    min: z.number().finite(),
    max: z.number().optional(),
  })
  .strict()
  .refine((cut) => cut.max === undefined || cut.max > cut.min, {
    message: "isolation max must be greater than min",
    path: ["max"],
  });

const kinematicCutSchema = z
  .object({
    ptMin: z.number().finite().min(0),
    ptMax: z.number().positive().optional(),
    etaMin: z.number().finite(),
    etaMax: z.number().finite(),
    isolation: isolationCutSchema.optional(),
  })
  .strict()
  .refine((cut) => cut.ptMax === undefined || cut.ptMax > cut.ptMin, {
    message: "ptMax must be greater than ptMin",
    path: ["ptMax"],
  })
  .refine((cut) => cut.etaMin <= cut.etaMax, {
    message: "etaMin must not exceed etaMax",
    path: ["etaMin"],
  });

const cutConfigSchema = z.record(z.string(), kinematicCutSchema).superRefine((value, ctx) => {
  for (const key of Object.keys(value)) {
    if (!isParticleCategory(key)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `unknown particle category "${key}"`,
        path: [key],
      });
    }
  }
});

const runSchema = z.object({
  inputPath: z.string().min(1),
  backgroundPath: z.string().min(1).optional(),
  cutsPath: z.string().min(1).optional(),
  feature: z.string().min(1).optional(),
  leadingLeptons: z.number().int().min(0).max(10),
  leadingJets: z.number().int().min(0).max(20),
  leadingPhotons: z.number().int().min(0).max(10),
  includeMet: z.boolean(),
  minDeltaR: z.number().min(0).max(10).optional(),
  integral: z.number().positive(),
  seed: z.string().min(1),
  debug: z.boolean(),
});

export const DEFAULT_CUTS: Readonly<CutConfig> = {
  electron: { ptMin: 10, etaMin: -2.5, etaMax: 2.5 },
  muon: { ptMin: 10, etaMin: -2.5, etaMax: 2.5 },
  lepton: { ptMin: 10, etaMin: -2.5, etaMax: 2.5 },
  light_jet: { ptMin: 20, etaMin: -5, etaMax: 5 },
  b_jet: { ptMin: 20, etaMin: -2.5, etaMax: 2.5 },
  tau_jet: { ptMin: 20, etaMin: -2.5, etaMax: 2.5 },
  other_jet: { ptMin: 20, etaMin: -5, etaMax: 5 },
  photon: { ptMin: 10, etaMin: -2.5, etaMax: 2.5 },
  met: { ptMin: 0, etaMin: -5, etaMax: 5 },
  generic: { ptMin: 0, etaMin: -10, etaMax: 10 },
};

const DEFAULTS = {
  leadingLeptons: 1,
  leadingJets: 2,
  leadingPhotons: 0,
  includeMet: true,
  integral: 1,
  seed: "kinematics",
  debug: false,
} as const;

type CliRaw = Record<string, string | boolean>;

export function parseCutConfig(raw: unknown): CutConfig {
  const parsed = cutConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new InvalidArgumentError(`invalid kinematic cut configuration: ${details}`);
  }

  const cuts: CutConfig = {};
  for (const [key, cut] of Object.entries(parsed.data)) {
    if (isParticleCategory(key)) {
      cuts[key] = cut;
    }
  }
  return cuts;
}

/** Layers explicit cuts over the defaults, category by category. */
export function mergeCutConfig(overrides: CutConfig, base: CutConfig = DEFAULT_CUTS): CutConfig {
  return { ...base, ...overrides };
}

export function buildRunConfig(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): RunConfig {
  const args = parseCliArgs(argv);

  return runSchema.parse({
    inputPath: readString(args, "input", ""),
    backgroundPath: readOptionalString(args, "background"),
    cutsPath: readOptionalString(args, "cuts"),
    feature: readOptionalString(args, "feature"),
    leadingLeptons: readInt(args, "leading-leptons", DEFAULTS.leadingLeptons),
    leadingJets: readInt(args, "leading-jets", DEFAULTS.leadingJets),
    leadingPhotons: readInt(args, "leading-photons", DEFAULTS.leadingPhotons),
    includeMet: readBool(args, "met", DEFAULTS.includeMet),
    minDeltaR: readOptionalNumber(args, "min-delta-r"),
    integral: readNumber(args, "integral", DEFAULTS.integral),
    seed: readString(args, "seed", DEFAULTS.seed),
    debug: readBool(args, "debug", readEnvBool(env, "KINEMATICS_DEBUG", DEFAULTS.debug)),
  });
}

function parseCliArgs(argv: string[]): CliRaw {
  const out: CliRaw = {};
  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (!token.startsWith("--")) {
      continue;
    }
    const key = token.slice(2);
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) {
      out[key] = true;
      continue;
    }
    out[key] = next;
    i += 1;
  }
  return out;
}

function readString(args: CliRaw, key: string, fallback: string): string {
  const value = args[key];
  if (typeof value === "string") {
    return value;
  }
  return fallback;
}

function readOptionalString(args: CliRaw, key: string): string | undefined {
  const value = args[key];
  return typeof value === "string" ? value : undefined;
}

function readInt(args: CliRaw, key: string, fallback: number): number {
  const value = args[key];
  if (typeof value !== "string") {
    return fallback;
  }
  return Number.parseInt(value, 10);
}

function readNumber(args: CliRaw, key: string, fallback: number): number {
  const value = args[key];
  if (typeof value !== "string") {
    return fallback;
  }
  return Number.parseFloat(value);
}

function readOptionalNumber(args: CliRaw, key: string): number | undefined {
  const value = args[key];
  if (typeof value !== "string") {
    return undefined;
  }
  return Number.parseFloat(value);
}

function parseBool(value: string): boolean | undefined {
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  return undefined;
}

function readBool(args: CliRaw, key: string, fallback: boolean): boolean {
  const value = args[key];
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value !== "string") {
    return fallback;
  }
  return parseBool(value) ?? fallback;
}

function readEnvBool(env: NodeJS.ProcessEnv, key: string, fallback: boolean): boolean {
  const raw = env[key];
  if (!raw) {
    return fallback;
  }
  return parseBool(raw) ?? fallback;
}
