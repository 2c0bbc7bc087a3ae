/**
 * A source of raw configuration values.
 *
 * Sources only load. Validation and coercion happen in the zod schema;
 * later sources override earlier ones.
 */
export interface ConfigSource {
  /**
   * Name used for provenance, e.g. "env", "dotenv:.env".
   */
  readonly name: string

  /**
   * Load values. `undefined` means "not provided".
   */
  load(): Promise<Record<string, unknown>>
}

/**
 * Keep entries whose key starts with `prefix`, with the prefix removed.
 */
export function stripPrefix(
  values: Record<string, string | undefined>,
  prefix?: string,
): Record<string, string | undefined> {
  if (!prefix) return { ...values }

  const filtered: Record<string, string | undefined> = {}

  for (const [key, value] of Object.entries(values)) {
    if (key.startsWith(prefix)) {
      filtered[key.slice(prefix.length)] = value
    }
  }

  return filtered
}
