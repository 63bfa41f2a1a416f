import { z } from "zod"; // zod: validate environment-provided configuration

import { createFilter, createLogger } from "@rulecheck/verify-kernel";
import type { RunFilter, VerifyLogger } from "@rulecheck/verify-kernel";

const LogLevelZ = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

const HarnessEnvZ = z.object({
  RULECHECK_LOG_LEVEL: LogLevelZ.default("warn"),
  RULECHECK_RUN: z.string().default(""), // run filter regex ("test//case")
  RULECHECK_TAGS: z
    .string()
    .default("")
    .transform((s) =>
      s
        .split(",")
        .map((t) => t.trim())
        .filter((t) => t.length > 0)
    )
});

export interface HarnessConfig {
  readonly logLevel: z.infer<typeof LogLevelZ>;
  readonly run: string;
  readonly tags: ReadonlyArray<string>;
}

/**
 * Reads harness settings from the environment. Empty strings count as unset.
 */
export function loadHarnessConfig(env: NodeJS.ProcessEnv = process.env): HarnessConfig {
  const pick = (k: string): string | undefined => {
    const v = env[k];
    return v === undefined || v.trim() === "" ? undefined : v.trim();
  };

  const parsed = HarnessEnvZ.parse({
    RULECHECK_LOG_LEVEL: pick("RULECHECK_LOG_LEVEL")?.toLowerCase(),
    RULECHECK_RUN: pick("RULECHECK_RUN"),
    RULECHECK_TAGS: pick("RULECHECK_TAGS")
  });

  return { logLevel: parsed.RULECHECK_LOG_LEVEL, run: parsed.RULECHECK_RUN, tags: parsed.RULECHECK_TAGS };
}

export function filterFromConfig(config: HarnessConfig): RunFilter {
  return createFilter({ run: config.run, tags: config.tags });
}

export function loggerFromConfig(config: HarnessConfig): VerifyLogger {
  return createLogger({ level: config.logLevel });
}
