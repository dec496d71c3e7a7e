/**
 * Shared helpers dedicated to reading environment variables in a predictable
 * manner. Every reader accepts an explicit environment so configuration can be
 * resolved against a plain object in tests.
 */
export type EnvSource = Readonly<Record<string, string | undefined>>;

/** Trims the raw value and collapses blank strings to `undefined`. */
function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }

  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/** Returns the trimmed string when {@link name} is set to a non-empty value. */
export function readOptionalString(name: string, env: EnvSource = process.env): string | undefined {
  return normaliseEnvValue(env[name]);
}

/**
 * Reads an enum-like environment variable while validating that the literal
 * belongs to the supplied allow-list. Comparison is case-insensitive.
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

export function readEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  defaultValue: T,
  env: EnvSource = process.env,
): T {
  return readOptionalEnum(name, allowed, env) ?? defaultValue;
}
