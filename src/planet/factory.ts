import { StructuredLogger } from "../logger.js";
import { Combinator, Generator } from "../resources/catalog.js";
import type { BasicResourceType, ComplexResourceType } from "../resources/types.js";
import { GeneratorPlanetAI, type ExplorerRequestLimit, type GenerationOutcome } from "./ai.js";
import { PlanetConfigurationError } from "./errors.js";
import { resolveFairShareTuning, type FairShareLimiterOptions } from "./fairShare.js";
import type { PlanetToOrchestrator } from "./messages.js";
import { Planet } from "./planet.js";
import { PlanetState } from "./state.js";

/** Fixed characteristics of the generator-only planet type. */
export const GENERATOR_PLANET_PROFILE = Object.freeze({
  cellsCount: 5,
  canHaveRocket: false,
  maxCombinationRules: 0,
});

export const GENERATION_RULES: readonly BasicResourceType[] = ["Carbon", "Silicon", "Oxygen", "Hydrogen"];

export const COMBINATION_RULES: readonly ComplexResourceType[] = [];

export interface CreatePlanetOptions {
  requestLimit: ExplorerRequestLimit;
  toOrchestrator: (message: PlanetToOrchestrator) => void;
  logger?: StructuredLogger;
  /** Limiter tuning and clock override, used with `fair-share`. */
  fairShare?: FairShareLimiterOptions;
  onGenerationOutcome?: (outcome: GenerationOutcome) => void;
  /** Overrides kept for hosts that advertise a subset of the recipes. */
  generationRules?: readonly BasicResourceType[];
  combinationRules?: readonly ComplexResourceType[];
}

/**
 * Builds a generator-only planet: five energy cells, the four basic
 * generation recipes, no combination recipe and no rocket. Invalid
 * configuration throws a {@link PlanetConfigurationError} immediately.
 */
export function createPlanet(id: number, options: CreatePlanetOptions): Planet {
  if (!Number.isSafeInteger(id) || id < 0) {
    throw new PlanetConfigurationError("invalid planet id", [`expected a non-negative integer, received ${id}`]);
  }

  const generationRules = options.generationRules ?? GENERATION_RULES;
  const combinationRules = options.combinationRules ?? COMBINATION_RULES;
  if (generationRules.length === 0) {
    throw new PlanetConfigurationError("invalid generation rules", ["at least one generation rule is required"]);
  }
  if (combinationRules.length > GENERATOR_PLANET_PROFILE.maxCombinationRules) {
    throw new PlanetConfigurationError("invalid combination rules", [
      `generator-only planets accept at most ${GENERATOR_PLANET_PROFILE.maxCombinationRules} combination rules`,
    ]);
  }

  if (options.fairShare) {
    // Validated whatever the request limit.
    const { now: _now, ...tuning } = options.fairShare;
    resolveFairShareTuning(tuning);
  }

  const logger = (options.logger ?? new StructuredLogger()).child({ planet_id: id });
  const generator = new Generator(generationRules);
  const combinator = new Combinator(combinationRules);
  const state = new PlanetState({
    id,
    cellsCount: GENERATOR_PLANET_PROFILE.cellsCount,
    canHaveRocket: GENERATOR_PLANET_PROFILE.canHaveRocket,
  });
  const ai = new GeneratorPlanetAI({
    requestLimit: options.requestLimit,
    logger: logger.child({ component: "planet_ai" }),
    fairShare: options.fairShare,
    onGenerationOutcome: options.onGenerationOutcome,
  });

  return new Planet({
    state,
    ai,
    generator,
    combinator,
    toOrchestrator: options.toOrchestrator,
    logger,
  });
}
