/**
 * Readers for environment variables. Every helper takes the environment record
 * explicitly so settings can be resolved once at startup from `process.env`
 * and from plain objects in tests. Values are trimmed and blanks count as
 * unset.
 */
export type EnvSource = Readonly<Record<string, string | undefined>>;

const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/** Returns the trimmed value of {@link name}, or `undefined` when blank. */
export function readOptionalString(env: EnvSource, name: string): string | undefined {
  return normaliseEnvValue(env[name]);
}

export function readString(env: EnvSource, name: string, defaultValue: string): string {
  return readOptionalString(env, name) ?? defaultValue;
}

/**
 * Interprets {@link name} as a boolean. Human-friendly literals are accepted
 * ("1", "true", "yes", "on" and their negations); anything else falls back to
 * the default.
 */
export function readBool(env: EnvSource, name: string, defaultValue: boolean): boolean {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return defaultValue;
  }
  const lower = normalised.toLowerCase();
  if (TRUE_LITERALS.has(lower)) {
    return true;
  }
  if (FALSE_LITERALS.has(lower)) {
    return false;
  }
  return defaultValue;
}

/**
 * Reads {@link name} as a number without applying bounds. Callers validate the
 * result themselves so that an out-of-range literal is reported rather than
 * silently replaced by a default. Unparseable input yields `NaN`.
 */
export function readOptionalNumber(env: EnvSource, name: string): number | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return undefined;
  }
  return Number(normalised);
}

/**
 * Reads an enum-like variable. Comparison is case-insensitive and unknown
 * literals resolve to the default.
 */
export function readEnum<T extends string>(
  env: EnvSource,
  name: string,
  allowed: readonly T[],
  defaultValue: T,
): T {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return defaultValue;
  }
  const lower = normalised.toLowerCase();
  return allowed.find((value) => value.toLowerCase() === lower) ?? defaultValue;
}
