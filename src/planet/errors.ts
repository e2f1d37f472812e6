/**
 * Error raised when a caller breaks the contract of the planet internals, for
 * example by synthesising a resource from an empty energy cell. These errors
 * signal a bug in the dispatcher and are never recovered from.
 */
export class PlanetContractViolationError extends Error {
  public readonly code = "E-PLANET-CONTRACT";
  public readonly details: Record<string, unknown>;

  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = "PlanetContractViolationError";
    this.details = details;
  }
}

/**
 * Error raised while assembling a planet from an invalid configuration
 * (duplicated recipes, recipes the planet type does not allow, invalid
 * fair-share tuning, ...). Construction fails before any message is handled.
 */
export class PlanetConfigurationError extends Error {
  public readonly code = "E-PLANET-CONFIG";
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "PlanetConfigurationError";
    this.issues = issues;
  }
}
