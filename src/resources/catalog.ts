import { randomUUID } from "node:crypto";

import { PlanetConfigurationError, PlanetContractViolationError } from "../planet/errors.js";
import type { EnergyCell } from "../planet/state.js";
import type { BasicResource, BasicResourceType, ComplexResourceType } from "./types.js";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

function findDuplicates<T extends string>(rules: readonly T[]): T[] {
  const seen = new Set<T>();
  const duplicates = new Set<T>();
  for (const rule of rules) {
    if (seen.has(rule)) {
      duplicates.add(rule);
    }
    seen.add(rule);
  }
  return [...duplicates];
}

/**
 * Generation recipes available on a planet. Each recipe turns the energy of
 * one charged cell into a single basic resource.
 */
export class Generator {
  private readonly rules: readonly BasicResourceType[];

  constructor(rules: readonly BasicResourceType[]) {
    const duplicates = findDuplicates(rules);
    if (duplicates.length > 0) {
      throw new PlanetConfigurationError(
        "duplicated generation rules",
        duplicates.map((rule) => `${rule} listed more than once`),
      );
    }
    this.rules = [...rules];
  }

  /** Categories advertised to explorers, in configuration order. */
  public availableRecipes(): BasicResourceType[] {
    return [...this.rules];
  }

  public supports(type: BasicResourceType): boolean {
    return this.rules.includes(type);
  }

  /**
   * Consumes the cell and produces one resource of the requested category.
   * The cell must be charged and the category configured on this planet.
   */
  public make<T extends BasicResourceType>(type: T, cell: EnergyCell): BasicResource<T> {
    if (!this.supports(type)) {
      throw new PlanetContractViolationError(`generation recipe ${type} is not available`, {
        type,
        available: this.availableRecipes(),
      });
    }
    if (!cell.isCharged()) {
      throw new PlanetContractViolationError(`cannot generate ${type} from an empty energy cell`, { type });
    }
    cell.discharge();
    return { kind: "basic", type, id: randomUUID() };
  }
}

/**
 * Combination recipes available on a planet. Only the advertised list is
 * modelled; generator-only planets are configured with an empty list.
 */
export class Combinator {
  private readonly rules: readonly ComplexResourceType[];

  constructor(rules: readonly ComplexResourceType[]) {
    const duplicates = findDuplicates(rules);
    if (duplicates.length > 0) {
      throw new PlanetConfigurationError(
        "duplicated combination rules",
        duplicates.map((rule) => `${rule} listed more than once`),
      );
    }
    this.rules = [...rules];
  }

  public availableRecipes(): ComplexResourceType[] {
    return [...this.rules];
  }
}
