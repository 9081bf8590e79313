export type Feature = {
  key: string
  content: string
  /** Relative reference the feature line links to */
  id?: string
}

export const DEFAULT_ITEM_PREFIX = '- '

/**
 * Ordered features of a single module. Re-registering a key replaces the
 * entry in place, so the rendered order is the order keys were first seen.
 */
export class FeatureRegistry {
  private readonly entries = new Map<string, Feature>()

  register(key: string, content: string, id?: string): void {
    const feature: Feature = id ? { key, content, id } : { key, content }
    this.entries.set(key, Object.freeze(feature))
  }

  has(key: string): boolean {
    return this.entries.has(key)
  }

  get(key: string): Feature | undefined {
    return this.entries.get(key)
  }

  list(): Feature[] {
    return Array.from(this.entries.values())
  }

  get size(): number {
    return this.entries.size
  }

  /**
   * One line per feature. An empty registry serializes to `''`, which callers
   * treat as "no features section".
   */
  serialize(itemPrefix: string = DEFAULT_ITEM_PREFIX, pathPrefix = ''): string {
    return this.list()
      .map((feature) =>
        feature.id
          ? `${itemPrefix}[${feature.key}](${pathPrefix}${feature.id}) : ${feature.content}`
          : `${itemPrefix}${feature.key} : ${feature.content}`
      )
      .join('\n')
  }
}
