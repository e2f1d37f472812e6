import type { Generator } from "../resources/catalog.js";
import type { BasicResource, BasicResourceType } from "../resources/types.js";
import type { EnergyCell } from "./state.js";

/**
 * Turns one charged cell into the requested basic resource. The generator
 * throws a {@link PlanetContractViolationError} for an empty cell or an
 * unsupported category; callers must not catch it.
 */
export function synthesizeBasicResource<T extends BasicResourceType>(
  generator: Generator,
  type: T,
  cell: EnergyCell,
): BasicResource<T> {
  return generator.make(type, cell);
}
