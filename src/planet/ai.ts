import type { StructuredLogger } from "../logger.js";
import type { Combinator, Generator } from "../resources/catalog.js";
import type { BasicResourceType } from "../resources/types.js";
import { decomposeCombinationRequest } from "./decompose.js";
import { FairShareLimiter, type AdmissionDecision, type FairShareLimiterOptions } from "./fairShare.js";
import type { ExplorerToPlanet, PlanetToExplorer } from "./messages.js";
import type { PlanetState, PlanetStateSnapshot, Rocket, Sunray } from "./state.js";
import { synthesizeBasicResource } from "./synthesis.js";

/**
 * Behaviour shared by every planet variant. The host owns the state and the
 * recipe catalogue and calls exactly one handler at a time.
 */
export interface PlanetAI {
  start(state: PlanetState): void;
  stop(state: PlanetState): void;
  handleEnergyDelivery(state: PlanetState, sunray: Sunray): void;
  /** Returns the rocket launched against the asteroid, if any. */
  handleHazard(state: PlanetState, generator: Generator, combinator: Combinator): Rocket | null;
  handleStateQuery(state: PlanetState): PlanetStateSnapshot;
  handleExplorerMessage(
    state: PlanetState,
    generator: Generator,
    combinator: Combinator,
    message: ExplorerToPlanet,
  ): PlanetToExplorer;
}

export const EXPLORER_REQUEST_LIMITS = ["unrestricted", "fair-share"] as const;

/** How generation requests are rationed between explorers. */
export type ExplorerRequestLimit = (typeof EXPLORER_REQUEST_LIMITS)[number];

/**
 * Outcome of a generation request. Explorers only see `resource: null` for
 * every refusal cause; the cause is reported to listeners and logs.
 */
export type GenerationOutcome =
  | { explorerId: number; resource: BasicResourceType; status: "unsupported" }
  | { explorerId: number; resource: BasicResourceType; status: "granted"; cellIndex: number; decision: AdmissionDecision | null }
  | { explorerId: number; resource: BasicResourceType; status: "no-energy" }
  | { explorerId: number; resource: BasicResourceType; status: "rate-limited"; decision: AdmissionDecision };

export interface GeneratorPlanetAIOptions {
  requestLimit: ExplorerRequestLimit;
  logger: StructuredLogger;
  /** Limiter tuning and clock, only used with `fair-share`. */
  fairShare?: FairShareLimiterOptions;
  onGenerationOutcome?: (outcome: GenerationOutcome) => void;
}

export const COMBINATION_REFUSAL_REASON = "This planet type can't combine resources.";

/**
 * AI of a generator-only planet: it turns sunrays into basic resources, never
 * combines, and cannot build rockets.
 */
export class GeneratorPlanetAI implements PlanetAI {
  private readonly requestLimit: ExplorerRequestLimit;
  private readonly logger: StructuredLogger;
  private readonly limiter: FairShareLimiter | null;
  private readonly outcomeListener?: (outcome: GenerationOutcome) => void;

  constructor(options: GeneratorPlanetAIOptions) {
    this.requestLimit = options.requestLimit;
    this.logger = options.logger;
    this.limiter = options.requestLimit === "fair-share" ? new FairShareLimiter(options.fairShare) : null;
    this.outcomeListener = options.onGenerationOutcome;
  }

  public getRequestLimit(): ExplorerRequestLimit {
    return this.requestLimit;
  }

  /** Fair-share limiter, `null` when requests are unrestricted. */
  public getLimiter(): FairShareLimiter | null {
    return this.limiter;
  }

  public start(state: PlanetState): void {
    this.logger.info("planet_ai_started", { request_limit: this.requestLimit, cells: state.cellsCount() });
  }

  public stop(state: PlanetState): void {
    this.logger.info("planet_ai_stopped", { charged_cells: state.chargedCellsCount() });
  }

  public handleEnergyDelivery(state: PlanetState, sunray: Sunray): void {
    const wasted = state.chargeCell(sunray);
    if (wasted) {
      this.logger.debug("sunray_wasted", { sunray_id: wasted.id });
    }
  }

  public handleHazard(state: PlanetState, _generator: Generator, _combinator: Combinator): Rocket | null {
    this.logger.warn("asteroid_unanswered", {
      reason: "planet cannot build rockets",
      charged_cells: state.chargedCellsCount(),
    });
    return null;
  }

  public handleStateQuery(state: PlanetState): PlanetStateSnapshot {
    return state.toSnapshot();
  }

  public handleExplorerMessage(
    state: PlanetState,
    generator: Generator,
    combinator: Combinator,
    message: ExplorerToPlanet,
  ): PlanetToExplorer {
    switch (message.type) {
      case "SupportedResourceRequest":
        return { type: "SupportedResourceResponse", resourceList: generator.availableRecipes() };
      case "SupportedCombinationRequest":
        return { type: "SupportedCombinationResponse", combinationList: combinator.availableRecipes() };
      case "GenerateResourceRequest":
        return this.handleGeneration(state, generator, message.explorerId, message.resource);
      case "CombineResourceRequest":
        return {
          type: "CombineResourceResponse",
          complexResponse: {
            ok: false,
            reason: COMBINATION_REFUSAL_REASON,
            inputs: decomposeCombinationRequest(message.msg),
          },
        };
      case "AvailableEnergyCellRequest":
        return { type: "AvailableEnergyCellResponse", availableCells: state.chargedCellsCount() };
    }
  }

  private handleGeneration(
    state: PlanetState,
    generator: Generator,
    explorerId: number,
    resource: BasicResourceType,
  ): PlanetToExplorer {
    // Checked before the limiter so the explorer is not billed for it.
    if (!generator.supports(resource)) {
      this.report({ explorerId, resource, status: "unsupported" });
      return { type: "GenerateResourceResponse", resource: null };
    }

    const full = state.fullCell();
    if (!full) {
      this.report({ explorerId, resource, status: "no-energy" });
      return { type: "GenerateResourceResponse", resource: null };
    }

    const decision = this.limiter ? this.limiter.admit(explorerId) : null;
    if (decision && !decision.granted) {
      this.report({ explorerId, resource, status: "rate-limited", decision });
      return { type: "GenerateResourceResponse", resource: null };
    }

    const produced = synthesizeBasicResource(generator, resource, full.cell);
    this.report({ explorerId, resource, status: "granted", cellIndex: full.index, decision });
    return { type: "GenerateResourceResponse", resource: produced };
  }

  private report(outcome: GenerationOutcome): void {
    const decision = outcome.status === "granted" || outcome.status === "rate-limited" ? outcome.decision : null;
    this.logger.debug("generation_outcome", {
      explorer_id: outcome.explorerId,
      resource: outcome.resource,
      status: outcome.status,
      ...(decision
        ? {
            score: decision.score,
            average_score: decision.averageScore,
            tolerance: decision.tolerance,
            active_count: decision.activeCount,
          }
        : {}),
    });
    this.outcomeListener?.(outcome);
  }
}
