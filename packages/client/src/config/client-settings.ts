import { type LogLevelName, logLevelNames } from "@memc/logger"
import { z } from "zod"
import type { ClientOptions } from "../ports/client-options"
import type { Config } from "./config"
import { DotenvSource } from "./dotenv-source"
import { EnvSource } from "./env-source"
import { loadConfig } from "./load-config"
import type { ConfigSource } from "./source"

export const ENV_PREFIX = "MEMC_"

const hostPort = /^(\[[0-9a-fA-F:.]+\]|[^\s:[\]]+):\d{1,5}$/

/**
 * Keys as they appear once {@link ENV_PREFIX} is stripped, e.g.
 * `MEMC_SERVERS` becomes `SERVERS`.
 */
export const clientSettingsSchema = z.object({
  SERVERS: z
    .string()
    .default("")
    .transform((raw) =>
      raw
        .split(",")
        .map((s) => s.trim())
        .filter((s) => s.length > 0),
    )
    .pipe(z.array(z.string().regex(hostPort, "expected host:port"))),
  DIAL_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(0),
  DEFAULT_TTL_MS: z.coerce.number().int().nonnegative().multipleOf(1000).default(0),
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
})

export type ClientSettingsValues = z.output<typeof clientSettingsSchema>

export type ClientSettings = {
  servers: string[]
  options: ClientOptions
  logLevel: LogLevelName
  config: Config<ClientSettingsValues>
}

export function defaultSettingsSources(cwd?: string): ConfigSource[] {
  return [
    new DotenvSource({ file: ".env", required: false, prefix: ENV_PREFIX, cwd }),
    new EnvSource({ prefix: ENV_PREFIX }),
  ]
}

/**
 * Fail on `MEMC_` keys the schema does not declare, such as `MEMC_SERVER`.
 */
function rejectUnknownKeys(config: Config<ClientSettingsValues>): void {
  const unknown = config.unknownKeys()
  if (unknown.length === 0) return

  const found = unknown.map(({ key, source }) => `${ENV_PREFIX}${key} (${source})`)
  const known = Object.keys(clientSettingsSchema.shape).map((key) => `${ENV_PREFIX}${key}`)

  throw new Error(`Unknown settings: ${found.join(", ")}. Known: ${known.join(", ")}`)
}

/**
 * Load client settings from `.env` and the process environment.
 *
 * @throws Error if a value is invalid or a `MEMC_` key is not a known
 * setting.
 *
 * @example
 * ```ts
 * const settings = await loadClientSettings()
 * const client = createClient(settings.servers, settings.options, {
 *   logger: createPinoLogger({ level: settings.logLevel }),
 * })
 * ```
 */
export async function loadClientSettings(
  sources: readonly ConfigSource[] = defaultSettingsSources(),
): Promise<ClientSettings> {
  const config = await loadConfig({ schema: clientSettingsSchema, sources })
  rejectUnknownKeys(config)

  const values = config.value

  return {
    servers: [...values.SERVERS],
    options: {
      dialTimeout: values.DIAL_TIMEOUT_MS,
      defaultTtl: values.DEFAULT_TTL_MS,
    },
    logLevel: values.LOG_LEVEL,
    config,
  }
}
