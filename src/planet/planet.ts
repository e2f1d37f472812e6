import type { StructuredLogger } from "../logger.js";
import type { Combinator, Generator } from "../resources/catalog.js";
import type { PlanetAI } from "./ai.js";
import {
  ExplorerToPlanetSchema,
  type ExplorerSink,
  type ExplorerToPlanet,
  type OrchestratorToPlanet,
  type PlanetToOrchestrator,
} from "./messages.js";
import type { PlanetState } from "./state.js";

/** Lifecycle of a planet as driven by the orchestrator. */
export type PlanetLifecycle = "stopped" | "running" | "killed";

const LIFECYCLE_TRANSITIONS: Record<PlanetLifecycle, readonly PlanetLifecycle[]> = {
  stopped: ["running", "killed"],
  running: ["stopped", "killed"],
  killed: [],
};

export interface PlanetOptions {
  state: PlanetState;
  ai: PlanetAI;
  generator: Generator;
  combinator: Combinator;
  toOrchestrator: (message: PlanetToOrchestrator) => void;
  logger: StructuredLogger;
}

type Envelope =
  | { source: "orchestrator"; message: OrchestratorToPlanet }
  | { source: "explorer"; message: unknown };

/**
 * In-process host of a planet. Messages from the orchestrator and from
 * explorers go through a single FIFO mailbox and are handled one at a time,
 * even when a reply sink sends a new message from inside its callback.
 */
export class Planet {
  private readonly state: PlanetState;
  private readonly ai: PlanetAI;
  private readonly generator: Generator;
  private readonly combinator: Combinator;
  private readonly toOrchestrator: (message: PlanetToOrchestrator) => void;
  private readonly logger: StructuredLogger;
  private readonly explorers = new Map<number, ExplorerSink>();
  private readonly mailbox: Envelope[] = [];
  private draining = false;
  private lifecycle: PlanetLifecycle = "stopped";

  constructor(options: PlanetOptions) {
    this.state = options.state;
    this.ai = options.ai;
    this.generator = options.generator;
    this.combinator = options.combinator;
    this.toOrchestrator = options.toOrchestrator;
    this.logger = options.logger;
  }

  public id(): number {
    return this.state.id();
  }

  public getLifecycle(): PlanetLifecycle {
    return this.lifecycle;
  }

  /** Read access for hosts and tests; mutations go through messages. */
  public getState(): PlanetState {
    return this.state;
  }

  public getGenerator(): Generator {
    return this.generator;
  }

  public getCombinator(): Combinator {
    return this.combinator;
  }

  public registeredExplorers(): number[] {
    return [...this.explorers.keys()].sort((left, right) => left - right);
  }

  public sendFromOrchestrator(message: OrchestratorToPlanet): void {
    this.enqueue({ source: "orchestrator", message });
  }

  /** Explorer payloads are validated before they reach the AI. */
  public sendFromExplorer(message: unknown): void {
    this.enqueue({ source: "explorer", message });
  }

  private enqueue(envelope: Envelope): void {
    this.mailbox.push(envelope);
    if (this.draining) {
      return;
    }
    this.draining = true;
    try {
      let next = this.mailbox.shift();
      while (next) {
        if (next.source === "orchestrator") {
          this.handleOrchestrator(next.message);
        } else {
          this.handleExplorer(next.message);
        }
        next = this.mailbox.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  private transition(to: PlanetLifecycle): boolean {
    if (!LIFECYCLE_TRANSITIONS[this.lifecycle].includes(to)) {
      this.logger.warn("planet_transition_ignored", { from: this.lifecycle, to });
      return false;
    }
    this.lifecycle = to;
    return true;
  }

  private handleOrchestrator(message: OrchestratorToPlanet): void {
    if (this.lifecycle === "killed") {
      this.logger.debug("planet_message_dropped", { reason: "killed", type: message.type });
      return;
    }

    const planetId = this.state.id();
    switch (message.type) {
      case "StartPlanetAI":
        if (this.transition("running")) {
          this.ai.start(this.state);
        }
        this.toOrchestrator({ type: "StartPlanetAIResult", planetId });
        return;
      case "StopPlanetAI":
        if (this.transition("stopped")) {
          this.ai.stop(this.state);
        }
        this.toOrchestrator({ type: "StopPlanetAIResult", planetId });
        return;
      case "KillPlanet":
        this.transition("killed");
        this.explorers.clear();
        this.mailbox.length = 0;
        this.toOrchestrator({ type: "KillPlanetResult", planetId });
        return;
      case "IncomingExplorerRequest":
        this.explorers.set(message.explorerId, message.sink);
        this.logger.debug("explorer_registered", { explorer_id: message.explorerId });
        this.toOrchestrator({ type: "IncomingExplorerResponse", planetId, explorerId: message.explorerId });
        return;
      case "OutgoingExplorerRequest":
        this.explorers.delete(message.explorerId);
        this.logger.debug("explorer_unregistered", { explorer_id: message.explorerId });
        this.toOrchestrator({ type: "OutgoingExplorerResponse", planetId, explorerId: message.explorerId });
        return;
      default:
        break;
    }

    if (this.lifecycle === "stopped") {
      this.toOrchestrator({ type: "Stopped", planetId });
      return;
    }

    switch (message.type) {
      case "Sunray":
        this.ai.handleEnergyDelivery(this.state, message.sunray);
        this.toOrchestrator({ type: "SunrayAck", planetId });
        return;
      case "Asteroid": {
        const rocket = this.ai.handleHazard(this.state, this.generator, this.combinator);
        this.toOrchestrator({ type: "AsteroidAck", planetId, rocket });
        return;
      }
      case "InternalStateRequest":
        this.toOrchestrator({
          type: "InternalStateResponse",
          planetId,
          planetState: this.ai.handleStateQuery(this.state),
        });
        return;
    }
  }

  private handleExplorer(raw: unknown): void {
    if (this.lifecycle === "killed") {
      return;
    }

    const parsed = ExplorerToPlanetSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn("explorer_message_rejected", {
        issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      });
      return;
    }

    const message: ExplorerToPlanet = parsed.data;
    const sink = this.explorers.get(message.explorerId);
    if (!sink) {
      this.logger.warn("explorer_message_dropped", {
        explorer_id: message.explorerId,
        reason: "explorer not registered",
        type: message.type,
      });
      return;
    }

    if (this.lifecycle === "stopped") {
      sink({ type: "Stopped" });
      return;
    }

    sink(this.ai.handleExplorerMessage(this.state, this.generator, this.combinator, message));
  }
}
