const ENV_REFERENCE = /^\$\{([A-Za-z_][A-Za-z0-9_]*)\}$/

/**
 * Returns the variable name when `value` is exactly `${NAME}`.
 */
export function envReferenceName(value: string): string | undefined {
  return ENV_REFERENCE.exec(value)?.[1]
}

/**
 * Replaces a whole-value `${NAME}` reference with `env[NAME]`, or `""` when the
 * variable is unset. Any other value is returned as is.
 */
export function resolveEnvReference(
  value: string,
  env: Record<string, string | undefined>,
): string {
  const name = envReferenceName(value)

  if (name === undefined) return value

  return env[name] ?? ""
}
