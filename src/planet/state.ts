import { randomUUID } from "node:crypto";

import { PlanetContractViolationError } from "./errors.js";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/** Unit of energy delivered by the orchestrator. */
export interface Sunray {
  readonly id: string;
}

/** Hazard delivered by the orchestrator. Only planets owning a rocket survive it. */
export interface Asteroid {
  readonly id: string;
}

/** Countermeasure a planet may launch against an asteroid. */
export interface Rocket {
  readonly id: string;
}

export function createSunray(): Sunray {
  return { id: randomUUID() };
}

export function createAsteroid(): Asteroid {
  return { id: randomUUID() };
}

/** Energy storage slot. A cell is either charged or empty. */
export class EnergyCell {
  private charged = false;

  public isCharged(): boolean {
    return this.charged;
  }

  /** Stores the energy of the sunray. Charging a charged cell is a no-op. */
  public charge(_sunray: Sunray): void {
    this.charged = true;
  }

  /** Consumes the stored energy. Discharging an empty cell is a contract violation. */
  public discharge(): void {
    if (!this.charged) {
      throw new PlanetContractViolationError("cannot discharge an empty energy cell");
    }
    this.charged = false;
  }
}

/** Read-only view of the planet internals reported to the orchestrator. */
export interface PlanetStateSnapshot {
  energyCells: boolean[];
  chargedCellsCount: number;
  hasRocket: boolean;
}

export interface PlanetStateOptions {
  id: number;
  cellsCount: number;
  canHaveRocket: boolean;
}

/**
 * Mutable planet internals: the ordered energy cell array plus the optional
 * rocket. Cells are always charged and discharged in store order so the
 * charged cells form a prefix after a sequence of sunrays.
 */
export class PlanetState {
  private readonly planetId: number;
  private readonly cells: EnergyCell[];
  private readonly rocketAllowed: boolean;
  private rocket: Rocket | null = null;

  constructor(options: PlanetStateOptions) {
    this.planetId = options.id;
    this.cells = Array.from({ length: options.cellsCount }, () => new EnergyCell());
    this.rocketAllowed = options.canHaveRocket;
  }

  public id(): number {
    return this.planetId;
  }

  public cellsCount(): number {
    return this.cells.length;
  }

  public cell(index: number): EnergyCell {
    const cell = this.cells[index];
    if (!cell) {
      throw new PlanetContractViolationError(`energy cell ${index} does not exist`, {
        index,
        cellsCount: this.cells.length,
      });
    }
    return cell;
  }

  public canHaveRocket(): boolean {
    return this.rocketAllowed;
  }

  public hasRocket(): boolean {
    return this.rocket !== null;
  }

  /**
   * Charges the first empty cell. When every cell is already charged the
   * sunray cannot be stored and is handed back to the caller.
   */
  public chargeCell(sunray: Sunray): Sunray | null {
    const empty = this.cells.find((cell) => !cell.isCharged());
    if (!empty) {
      return sunray;
    }
    empty.charge(sunray);
    return null;
  }

  /** Returns the first charged cell alongside its index. */
  public fullCell(): { cell: EnergyCell; index: number } | null {
    const index = this.cells.findIndex((cell) => cell.isCharged());
    if (index === -1) {
      return null;
    }
    return { cell: this.cell(index), index };
  }

  public chargedCellsCount(): number {
    return this.cells.filter((cell) => cell.isCharged()).length;
  }

  public toSnapshot(): PlanetStateSnapshot {
    const energyCells = this.cells.map((cell) => cell.isCharged());
    return {
      energyCells,
      chargedCellsCount: energyCells.filter(Boolean).length,
      hasRocket: this.hasRocket(),
    };
  }
}
