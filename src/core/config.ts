import { readFileSync } from "node:fs";
import { z } from "zod";

import { configError } from "./errors.js";

const ENV_VAR_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

const BUNDLED_CORPUS_URL = new URL("../../data/corpus.json", import.meta.url);

export const ContributorSchema = z
  .object({
    name: z.string().min(1),
    email: z.string().email(),
  })
  .strict();

export const CategorySchema = z
  .object({
    name: z.string().min(1),
    count: z.number().int().min(0),
    templates: z.array(z.string().min(1)).min(1),
  })
  .strict();

export const LanguageSchema = z
  .object({
    name: z.string().min(1),
    weight: z.number().min(0),
    extensions: z.array(z.string().regex(/^\./, "extension must start with a dot")).min(1),
  })
  .strict();

export const CorpusSchema = z
  .object({
    categories: z.array(CategorySchema).min(1),
    languages: z
      .array(LanguageSchema)
      .min(1)
      .refine((languages) => languages.some((language) => language.weight > 0), {
        message: "at least one language needs a positive weight",
      }),
    contributors: z.array(ContributorSchema).min(1),
  })
  .strict();

export type Corpus = z.output<typeof CorpusSchema>;

let bundledCorpus: Corpus | undefined;

/** Category, language and contributor tables shipped in `data/corpus.json`. */
export function loadBundledCorpus(): Corpus {
  if (!bundledCorpus) {
    const raw: unknown = JSON.parse(readFileSync(BUNDLED_CORPUS_URL, "utf8"));
    bundledCorpus = CorpusSchema.parse(raw);
  }
  return bundledCorpus;
}

const IntRangeSchema = z
  .tuple([z.number().int().min(1), z.number().int().min(1)])
  .refine(([min, max]) => min <= max, { message: "range minimum exceeds maximum" });

export const RangesSchema = z
  .object({
    lines: IntRangeSchema.default([1_000, 50_000]),
    // Two commits minimum: the bootstrap commit plus room for every other file.
    commits: z
      .tuple([z.number().int().min(2), z.number().int().min(2)])
      .refine(([min, max]) => min <= max, { message: "range minimum exceeds maximum" })
      .default([100, 500]),
    maxContributors: z.number().int().positive().default(5),
  })
  .strict()
  .default({});

export const TimelineSchema = z
  .object({
    spanDays: z.number().int().positive().default(365),
    minGapHours: z.number().int().positive().default(1),
    maxGapHours: z.number().int().positive().default(48),
  })
  .strict()
  .default({})
  .superRefine((value, ctx) => {
    if (value.minGapHours > value.maxGapHours) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["minGapHours"],
        message: "minGapHours exceeds maxGapHours",
      });
    }
  });

export const FaultInjectionSchema = z
  .object({
    enabled: z.boolean().default(true),
    probability: z.number().min(0).max(1).default(0.1),
  })
  .strict()
  .default({});

export const SynthConfigSchema = z
  .object({
    outputDir: z.string().min(1).default("./corpus"),
    targetCount: z.number().int().positive().default(1_000),
    startIndex: z.number().int().min(0).max(99_999).default(5_001),
    seed: z.union([z.string().min(1), z.number().int()]).optional(),
    concurrency: z.number().int().positive().default(1),
    skipExisting: z.boolean().default(true),
    ranges: RangesSchema,
    timeline: TimelineSchema,
    faultInjection: FaultInjectionSchema,
    categories: z.array(CategorySchema).min(1).default(() => loadBundledCorpus().categories),
    languages: z
      .array(LanguageSchema)
      .min(1)
      .default(() => loadBundledCorpus().languages),
    contributors: z
      .array(ContributorSchema)
      .min(1)
      .default(() => loadBundledCorpus().contributors),
  })
  .strict();

export const SynthConfig = SynthConfigSchema;
export type SynthConfig = z.output<typeof SynthConfigSchema>;
export type SynthConfigInput = z.input<typeof SynthConfigSchema>;

export interface LoadConfigOptions {
  env?: Record<string, string | undefined>;
}

export function defineConfig(config: SynthConfigInput): SynthConfigInput {
  return config;
}

export function interpolateEnvVars(
  value: string,
  env: Record<string, string | undefined> = getProcessEnv(),
  path: string[] = [],
): string {
  return value.replaceAll(ENV_VAR_PATTERN, (_, variableName: string) => {
    const interpolated = env[variableName];
    if (interpolated !== undefined) {
      return interpolated;
    }

    throw configError(
      "CONFIG_SECRET_MISSING",
      `Environment variable ${variableName} is referenced in config but not set`,
      {
        context: {
          variableName,
          path: path.length > 0 ? path.join(".") : "<root>",
        },
      },
    );
  });
}

export function loadConfig(config: unknown = {}, options: LoadConfigOptions = {}): SynthConfig {
  const env = options.env ?? getProcessEnv();
  const interpolatedConfig = interpolateConfigEnvVars(config, env);
  const parsed = SynthConfigSchema.safeParse(interpolatedConfig);

  if (parsed.success) {
    return parsed.data;
  }

  throw configError("CONFIG_INVALID", "Invalid repo-synth configuration", {
    context: {
      issues: parsed.error.issues.map((issue) => ({
        code: issue.code,
        message: issue.message,
        path: issue.path.join("."),
      })),
    },
  });
}

function interpolateConfigEnvVars(
  value: unknown,
  env: Record<string, string | undefined>,
  path: string[] = [],
): unknown {
  if (typeof value === "string") {
    return interpolateEnvVars(value, env, path);
  }

  if (Array.isArray(value)) {
    return value.map((item, index) => interpolateConfigEnvVars(item, env, [...path, `${index}`]));
  }

  if (!isPlainObject(value)) {
    return value;
  }

  const interpolatedObject: Record<string, unknown> = {};

  for (const [key, nestedValue] of Object.entries(value)) {
    interpolatedObject[key] = interpolateConfigEnvVars(nestedValue, env, [...path, key]);
  }

  return interpolatedObject;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function getProcessEnv(): Record<string, string | undefined> {
  return process.env;
}
