import { z } from "zod";

import {
  BasicResourceTypeSchema,
  ComplexResourceRequestSchema,
  type BasicResource,
  type BasicResourceType,
  type ComplexResourceRequest,
  type ComplexResourceType,
  type GenericResource,
} from "../resources/types.js";
import type { Asteroid, PlanetStateSnapshot, Rocket, Sunray } from "./state.js";

/** Callback delivering planet replies to one explorer. */
export type ExplorerSink = (message: PlanetToExplorer) => void;

/** Messages sent by the orchestrator to a planet. */
export type OrchestratorToPlanet =
  | { readonly type: "StartPlanetAI" }
  | { readonly type: "StopPlanetAI" }
  | { readonly type: "KillPlanet" }
  | { readonly type: "Sunray"; readonly sunray: Sunray }
  | { readonly type: "Asteroid"; readonly asteroid: Asteroid }
  | { readonly type: "InternalStateRequest" }
  | { readonly type: "IncomingExplorerRequest"; readonly explorerId: number; readonly sink: ExplorerSink }
  | { readonly type: "OutgoingExplorerRequest"; readonly explorerId: number };

/** Replies sent by a planet to the orchestrator. */
export type PlanetToOrchestrator =
  | { readonly type: "StartPlanetAIResult"; readonly planetId: number }
  | { readonly type: "StopPlanetAIResult"; readonly planetId: number }
  | { readonly type: "KillPlanetResult"; readonly planetId: number }
  | { readonly type: "SunrayAck"; readonly planetId: number }
  | { readonly type: "AsteroidAck"; readonly planetId: number; readonly rocket: Rocket | null }
  | { readonly type: "InternalStateResponse"; readonly planetId: number; readonly planetState: PlanetStateSnapshot }
  | { readonly type: "IncomingExplorerResponse"; readonly planetId: number; readonly explorerId: number }
  | { readonly type: "OutgoingExplorerResponse"; readonly planetId: number; readonly explorerId: number }
  | { readonly type: "Stopped"; readonly planetId: number };

/** Requests sent by explorers to a planet. */
export type ExplorerToPlanet =
  | { readonly type: "SupportedResourceRequest"; readonly explorerId: number }
  | { readonly type: "SupportedCombinationRequest"; readonly explorerId: number }
  | { readonly type: "GenerateResourceRequest"; readonly explorerId: number; readonly resource: BasicResourceType }
  | { readonly type: "CombineResourceRequest"; readonly explorerId: number; readonly msg: ComplexResourceRequest }
  | { readonly type: "AvailableEnergyCellRequest"; readonly explorerId: number };

/** Refused combination: the two inputs come back in submission order. */
export interface CombinationRefusal {
  readonly ok: false;
  readonly reason: string;
  readonly inputs: readonly [GenericResource, GenericResource];
}

/** Replies sent by a planet to an explorer. */
export type PlanetToExplorer =
  | { readonly type: "SupportedResourceResponse"; readonly resourceList: BasicResourceType[] }
  | { readonly type: "SupportedCombinationResponse"; readonly combinationList: ComplexResourceType[] }
  | { readonly type: "GenerateResourceResponse"; readonly resource: BasicResource | null }
  | { readonly type: "CombineResourceResponse"; readonly complexResponse: CombinationRefusal }
  | { readonly type: "AvailableEnergyCellResponse"; readonly availableCells: number }
  | { readonly type: "Stopped" };

const ExplorerIdSchema = z.number().int().nonnegative();

export const ExplorerToPlanetSchema: z.ZodType<ExplorerToPlanet> = z.discriminatedUnion("type", [
  z.object({ type: z.literal("SupportedResourceRequest"), explorerId: ExplorerIdSchema }),
  z.object({ type: z.literal("SupportedCombinationRequest"), explorerId: ExplorerIdSchema }),
  z.object({
    type: z.literal("GenerateResourceRequest"),
    explorerId: ExplorerIdSchema,
    resource: BasicResourceTypeSchema,
  }),
  z.object({
    type: z.literal("CombineResourceRequest"),
    explorerId: ExplorerIdSchema,
    msg: ComplexResourceRequestSchema,
  }),
  z.object({ type: z.literal("AvailableEnergyCellRequest"), explorerId: ExplorerIdSchema }),
]);
