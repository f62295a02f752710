/**
 * Insertion-ordered set of processed event ids, bounded by oldest-first eviction.
 * When the size exceeds `cap`, only the newest `keep` ids are retained.
 */
export class ProcessedSet {
  private ids = new Set<string>()

  constructor(
    private readonly cap = 1000,
    private readonly keep = 500,
  ) {
    if (keep > cap) throw new RangeError(`keep (${keep}) must not exceed cap (${cap})`)
  }

  static from(ids: Iterable<string>, cap?: number, keep?: number): ProcessedSet {
    const set = new ProcessedSet(cap, keep)
    for (const id of ids) set.add(id)
    return set
  }

  has(id: string): boolean {
    return this.ids.has(id)
  }

  add(id: string): void {
    if (this.ids.has(id)) return
    this.ids.add(id)
    if (this.ids.size > this.cap) {
      this.ids = new Set([...this.ids].slice(-this.keep))
    }
  }

  get size(): number {
    return this.ids.size
  }

  /** Oldest first. */
  toArray(): string[] {
    return [...this.ids]
  }
}
