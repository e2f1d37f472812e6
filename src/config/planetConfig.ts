import { z } from "zod";

import { LOG_LEVELS, StructuredLogger } from "../logger.js";
import { EXPLORER_REQUEST_LIMITS } from "../planet/ai.js";
import { PlanetConfigurationError } from "../planet/errors.js";
import { DEFAULT_FAIR_SHARE_TUNING, FairShareTuningSchema } from "../planet/fairShare.js";
import { readEnum, readNumber, readOptionalString, type Environment } from "./env.js";

const PlanetConfigSchema = z
  .object({
    requestLimit: z.enum(EXPLORER_REQUEST_LIMITS),
    log: z.object({
      file: z.string().min(1).nullable(),
      level: z.enum(LOG_LEVELS),
    }),
    fairShare: FairShareTuningSchema,
  })
  .strict();

export type PlanetConfig = z.infer<typeof PlanetConfigSchema>;

/**
 * Builds the planet configuration from the environment:
 *
 * - `PLANET_REQUEST_LIMIT`: `unrestricted` (default) or `fair-share`.
 * - `PLANET_LOG_FILE` / `PLANET_LOG_LEVEL`: optional log mirror and threshold.
 * - `PLANET_FAIR_SHARE_WINDOW_MS`, `PLANET_FAIR_SHARE_DECAY_PER_SECOND`,
 *   `PLANET_FAIR_SHARE_BURST`, `PLANET_FAIR_SHARE_REQUEST_COST`: limiter tuning.
 *
 * Unparseable or out-of-range values fall back to their defaults.
 */
export function loadPlanetConfig(env: Environment = process.env): PlanetConfig {
  const candidate = {
    requestLimit: readEnum(env, "PLANET_REQUEST_LIMIT", EXPLORER_REQUEST_LIMITS, "unrestricted"),
    log: {
      file: readOptionalString(env, "PLANET_LOG_FILE") ?? null,
      level: readEnum(env, "PLANET_LOG_LEVEL", LOG_LEVELS, "info"),
    },
    fairShare: {
      contentionWindowMs: readNumber(
        env,
        "PLANET_FAIR_SHARE_WINDOW_MS",
        DEFAULT_FAIR_SHARE_TUNING.contentionWindowMs,
        { min: 1 },
      ),
      decayPerSecond: readNumber(
        env,
        "PLANET_FAIR_SHARE_DECAY_PER_SECOND",
        DEFAULT_FAIR_SHARE_TUNING.decayPerSecond,
        { min: 0 },
      ),
      allowedRequestBurst: readNumber(
        env,
        "PLANET_FAIR_SHARE_BURST",
        DEFAULT_FAIR_SHARE_TUNING.allowedRequestBurst,
        { min: 0 },
      ),
      requestCost: readNumber(
        env,
        "PLANET_FAIR_SHARE_REQUEST_COST",
        DEFAULT_FAIR_SHARE_TUNING.requestCost,
        { min: Number.MIN_VALUE },
      ),
    },
  };

  const parsed = PlanetConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new PlanetConfigurationError(
      "invalid planet configuration",
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  return parsed.data;
}

/** Logger honouring the configured mirror file and level. */
export function createConfiguredLogger(config: PlanetConfig): StructuredLogger {
  return new StructuredLogger({ logFile: config.log.file, minLevel: config.log.level });
}
