/**
 * A key some source supplied that the schema does not declare.
 */
export type UnknownKey = {
  key: string
  source: string
}

/**
 * Validated settings, with the name of the source behind each raw key.
 */
export class Config<T extends Record<string, unknown>> {
  constructor(
    private readonly data: Readonly<T>,
    private readonly suppliedBy: ReadonlyMap<string, string>,
  ) {
    Object.freeze(this.data)
  }

  get value(): Readonly<T> {
    return this.data
  }

  /**
   * Source that supplied `key`, or "default" when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string {
    return this.suppliedBy.get(key) ?? "default"
  }

  /**
   * Supplied keys the schema dropped, usually misspelt settings.
   */
  unknownKeys(): UnknownKey[] {
    const unknown: UnknownKey[] = []

    for (const [key, source] of this.suppliedBy) {
      if (!Object.hasOwn(this.data, key)) unknown.push({ key, source })
    }

    return unknown
  }
}
