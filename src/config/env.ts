/**
 * Helpers reading environment variables with consistent coercion rules.
 * Every reader takes the environment as an argument so configuration loaders
 * can be exercised against plain objects.
 */
export type Environment = Readonly<Record<string, string | undefined>>;

interface NumberOptions {
  /** Minimum allowed value (inclusive). */
  readonly min?: number;
  /** Maximum allowed value (inclusive). */
  readonly max?: number;
}

/** Trims the raw value and treats blank strings as unset. */
function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/** `Infinity` and `NaN` are rejected so limits never become unbounded by accident. */
function withinBounds(value: number, options: NumberOptions | undefined): boolean {
  if (!Number.isFinite(value)) {
    return false;
  }
  if (options?.min !== undefined && value < options.min) {
    return false;
  }
  if (options?.max !== undefined && value > options.max) {
    return false;
  }
  return true;
}

/** Returns an optional floating-point number when {@link name} holds a finite value. */
export function readOptionalNumber(env: Environment, name: string, options?: NumberOptions): number | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return undefined;
  }
  if (!/^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/.test(normalised)) {
    return undefined;
  }
  const value = Number.parseFloat(normalised);
  return withinBounds(value, options) ? value : undefined;
}

export function readNumber(env: Environment, name: string, defaultValue: number, options?: NumberOptions): number {
  return readOptionalNumber(env, name, options) ?? defaultValue;
}

/** Returns the trimmed string when {@link name} is set to a non-empty value. */
export function readOptionalString(env: Environment, name: string): string | undefined {
  return normaliseEnvValue(env[name]);
}

/**
 * Reads an enum-like variable, matching the allow-list case-insensitively.
 * Unknown literals yield `undefined`.
 */
export function readOptionalEnum<T extends string>(
  env: Environment,
  name: string,
  allowed: readonly T[],
): T | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return undefined;
  }
  const lower = normalised.toLowerCase();
  return allowed.find((value) => value.toLowerCase() === lower);
}

export function readEnum<T extends string>(env: Environment, name: string, allowed: readonly T[], defaultValue: T): T {
  return readOptionalEnum(env, name, allowed) ?? defaultValue;
}
