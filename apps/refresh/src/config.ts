import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { config as loadEnv } from "dotenv";
import { z } from "zod";
import {
  ConfigurationError,
  ErrorCode,
  iceFallbackSchema,
  isoDateSchema,
  type UsageRunOptionsInput
} from "@teabase/contracts";

export function bootstrapEnv() {
  const here = path.dirname(fileURLToPath(import.meta.url));
  const candidates = [
    path.resolve(process.cwd(), ".env"),
    path.resolve(process.cwd(), "../../.env"),
    path.resolve(here, "../../../.env")
  ];

  for (const envPath of candidates) {
    if (!fs.existsSync(envPath)) continue;
    loadEnv({ path: envPath, override: false });
    return;
  }
}

const blankToUndefined = (value: unknown) => (typeof value === "string" && value.trim() === "" ? undefined : value);

const envSchema = z.object({
  TEABASE_RAW_INPUT: z.preprocess(blankToUndefined, z.string().trim().min(1).default("data/raw/pos_export.csv")),
  TEABASE_REFERENCE_DIR: z.preprocess(blankToUndefined, z.string().trim().min(1).default("data/reference")),
  TEABASE_OUTPUT_DIR: z.preprocess(blankToUndefined, z.string().trim().min(1).default("data/output")),
  TEABASE_START_DATE: z.preprocess(blankToUndefined, isoDateSchema.optional()),
  TEABASE_END_DATE: z.preprocess(blankToUndefined, isoDateSchema.optional()),
  TEABASE_ICE_FALLBACK: z.preprocess(blankToUndefined, iceFallbackSchema.default("nearest"))
});

export type RefreshConfig = {
  rawInput: string;
  referenceDir: string;
  outputDir: string;
  runOptions: UsageRunOptionsInput;
};

/** Paths resolve against `cwd`; date-range ordering is checked by the pipeline. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): RefreshConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      table: "env",
      rowNumber: null,
      message: `${issue.path.join(".")}: ${issue.message}`
    }));
    throw new ConfigurationError(
      ErrorCode.INVALID_CONSTANT,
      `Invalid environment: ${issues.map((issue) => issue.message).join("; ")}`,
      issues
    );
  }

  const data = parsed.data;
  return {
    rawInput: path.resolve(cwd, data.TEABASE_RAW_INPUT),
    referenceDir: path.resolve(cwd, data.TEABASE_REFERENCE_DIR),
    outputDir: path.resolve(cwd, data.TEABASE_OUTPUT_DIR),
    runOptions: {
      startDate: data.TEABASE_START_DATE,
      endDate: data.TEABASE_END_DATE,
      iceFallback: data.TEABASE_ICE_FALLBACK
    }
  };
}
