/**
 * Shared helpers dedicated to reading environment variables in a predictable
 * manner. Every reader accepts an explicit source so configuration can be
 * resolved from a plain record in tests and from {@link process.env} at
 * runtime.
 */
const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

/** Key/value view over environment variables. */
export type EnvSource = Readonly<Record<string, string | undefined>>;

/** Normalises the raw value retrieved from the environment source. */
function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }

  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/**
 * Reads the provided environment variable and interprets it as a boolean.
 *
 * The helper tolerates human-friendly variants ("1", "true", "yes", "on" for
 * truthy, "0", "false", "no", "off" for falsy) while falling back to the
 * supplied default when the variable is absent or ambiguous.
 */
export function readBool(name: string, defaultValue: boolean, env: EnvSource = process.env): boolean {
  return readOptionalBool(name, env) ?? defaultValue;
}

/** Returns an optional boolean if {@link name} is set to a recognised literal. */
export function readOptionalBool(name: string, env: EnvSource = process.env): boolean | undefined {
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
 * Reads an enum-like environment variable while validating that the literal
 * belongs to the supplied allow-list. Mixed-case input is accepted and the
 * canonical spelling from {@link allowed} is returned.
 */
export function readOptionalEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  env: EnvSource = process.env,
): T | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return undefined;
  }

  const lookup = new Map<string, T>();
  for (const value of allowed) {
    lookup.set(value.toLowerCase(), value);
  }
  return lookup.get(normalised.toLowerCase());
}

/** Returns a canonical enum value, defaulting when the variable is unset or invalid. */
export function readEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  defaultValue: T,
  env: EnvSource = process.env,
): T {
  return readOptionalEnum(name, allowed, env) ?? defaultValue;
}
