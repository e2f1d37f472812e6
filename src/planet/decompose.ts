import type { ComplexResourceRequest, GenericResource } from "../resources/types.js";

/** Ordered pair of inputs handed back to an explorer when a combination is refused. */
export type DecomposedInputs = readonly [GenericResource, GenericResource];

function assertNever(value: never): never {
  throw new TypeError(`unsupported combination recipe: ${JSON.stringify(value)}`);
}

/**
 * Splits a combination request back into its two inputs, in recipe order and
 * with their original basic/complex tags. The inputs are returned as-is.
 */
export function decomposeCombinationRequest(request: ComplexResourceRequest): DecomposedInputs {
  switch (request.recipe) {
    case "Water":
      return [request.hydrogen, request.oxygen];
    case "Diamond":
      return [request.carbon, request.secondCarbon];
    case "Life":
      return [request.water, request.carbon];
    case "Robot":
      return [request.silicon, request.life];
    case "Dolphin":
      return [request.water, request.life];
    case "AIPartner":
      return [request.robot, request.diamond];
    default:
      return assertNever(request);
  }
}
