export { StructuredLogger, LOG_LEVELS } from "./logger.js";
export type { LogBindings, LogEntry, LogLevel, LoggerOptions } from "./logger.js";
export { loadPlanetConfig, createConfiguredLogger } from "./config/planetConfig.js";
export type { PlanetConfig } from "./config/planetConfig.js";
export { monotonicClock, elapsedSeconds } from "./runtime/clock.js";
export type { Clock } from "./runtime/clock.js";
export * from "./resources/types.js";
export { Generator, Combinator } from "./resources/catalog.js";
export { PlanetConfigurationError, PlanetContractViolationError } from "./planet/errors.js";
export { EnergyCell, PlanetState, createAsteroid, createSunray } from "./planet/state.js";
export type { Asteroid, PlanetStateSnapshot, Rocket, Sunray } from "./planet/state.js";
export { ExplorerToPlanetSchema } from "./planet/messages.js";
export type {
  CombinationRefusal,
  ExplorerSink,
  ExplorerToPlanet,
  OrchestratorToPlanet,
  PlanetToExplorer,
  PlanetToOrchestrator,
} from "./planet/messages.js";
export { synthesizeBasicResource } from "./planet/synthesis.js";
export { decomposeCombinationRequest } from "./planet/decompose.js";
export type { DecomposedInputs } from "./planet/decompose.js";
export { FairShareLimiter, FairShareTuningSchema, DEFAULT_FAIR_SHARE_TUNING, resolveFairShareTuning } from "./planet/fairShare.js";
export type {
  AdmissionDecision,
  ExplorerUsageSnapshot,
  FairShareLimiterOptions,
  FairShareTuning,
} from "./planet/fairShare.js";
export { COMBINATION_REFUSAL_REASON, EXPLORER_REQUEST_LIMITS, GeneratorPlanetAI } from "./planet/ai.js";
export type { ExplorerRequestLimit, GenerationOutcome, GeneratorPlanetAIOptions, PlanetAI } from "./planet/ai.js";
export { Planet } from "./planet/planet.js";
export type { PlanetLifecycle, PlanetOptions } from "./planet/planet.js";
export { COMBINATION_RULES, GENERATION_RULES, GENERATOR_PLANET_PROFILE, createPlanet } from "./planet/factory.js";
export type { CreatePlanetOptions } from "./planet/factory.js";
