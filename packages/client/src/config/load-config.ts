import { type ZodType, z } from "zod"
import { Config } from "./config"
import type { ConfigSource } from "./source"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>
  sources: readonly ConfigSource[]
}

type Merged = {
  raw: Record<string, unknown>
  suppliedBy: Map<string, string>
}

async function mergeSources(sources: readonly ConfigSource[]): Promise<Merged> {
  const raw: Record<string, unknown> = {}
  const suppliedBy = new Map<string, string>()

  for (const source of sources) {
    for (const [key, value] of Object.entries(await source.load())) {
      if (value === undefined) continue

      raw[key] = value
      suppliedBy.set(key, source.name)
    }
  }

  return { raw, suppliedBy }
}

/**
 * Load every source in order (later ones win) and validate the merged
 * values against `schema`.
 *
 * @throws Error with the prettified zod report when validation fails.
 */
export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadConfigOptions<T>): Promise<Config<T>> {
  const { raw, suppliedBy } = await mergeSources(sources)
  const parsed = schema.safeParse(raw)

  if (!parsed.success) {
    throw new Error(`Configuration validation failed:\n${z.prettifyError(parsed.error)}`)
  }

  return new Config<T>(parsed.data, suppliedBy)
}
