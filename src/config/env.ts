/**
 * Tolerant readers for environment variables. Every helper takes the
 * environment record explicitly so configuration can be loaded from a
 * fixture in tests as easily as from {@link process.env}.
 */
const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

/** Environment record consumed by the readers. */
export type EnvSource = Readonly<Record<string, string | undefined>>;

/** Trims the raw value and maps blank strings to `undefined`. */
function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/** Returns an optional boolean if {@link name} is set to a recognised literal. */
export function readOptionalBool(env: EnvSource, name: string): boolean | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return undefined;
  }
  const lower = normalised.toLowerCase();
  if (TRUE_LITERALS.has(lower)) {
    return true;
  }
  if (FALSE_LITERALS.has(lower)) {
    return false;
  }
  return undefined;
}

/**
 * Reads {@link name} as a boolean ("1", "true", "yes", "on" and their falsy
 * counterparts), falling back to the default when unset or ambiguous.
 */
export function readBool(env: EnvSource, name: string, defaultValue: boolean): boolean {
  return readOptionalBool(env, name) ?? defaultValue;
}

/** Returns the trimmed string when {@link name} is set to a non-empty value. */
export function readOptionalString(env: EnvSource, name: string): string | undefined {
  return normaliseEnvValue(env[name]);
}

/**
 * Reads an enum-like variable, case-insensitively. Values outside the
 * allow-list resolve to `undefined`.
 */
export function readOptionalEnum<T extends string>(
  env: EnvSource,
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

export function readEnum<T extends string>(
  env: EnvSource,
  name: string,
  allowed: readonly T[],
  defaultValue: T,
): T {
  return readOptionalEnum(env, name, allowed) ?? defaultValue;
}
