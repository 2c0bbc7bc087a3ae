import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import { type ConfigSource, stripPrefix } from "./source"

export type DotenvSourceOptions = {
  /** File to read, absolute or relative to `cwd`, e.g. ".env.local". */
  file: string

  /** When false, a missing file yields no values. */
  required: boolean

  /** Keep only keys with this prefix, minus the prefix. */
  prefix?: string

  /** @default process.cwd() */
  cwd?: string
}

/**
 * Settings from a dotenv file, parsed without touching `process.env`.
 */
export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const content = await this.read()
    if (content === undefined) return {}

    return stripPrefix(parse(content), this.opts.prefix)
  }

  private async read(): Promise<string | undefined> {
    const file = path.resolve(this.opts.cwd ?? process.cwd(), this.opts.file)

    try {
      return await fs.readFile(file, "utf-8")
    } catch (err) {
      const missing = err instanceof Error && "code" in err && err.code === "ENOENT"
      if (missing && !this.opts.required) return undefined

      throw err
    }
  }
}
