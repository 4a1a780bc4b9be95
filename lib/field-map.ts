/**
 * Read-only, insertion-ordered view of a note's fields.
 *
 * Copies its input, exposes no mutators and is frozen, so a built `Note`
 * cannot be changed through its `fields`.
 */
export class FieldMap implements ReadonlyMap<string, string> {
  private readonly entriesByName: Map<string, string>

  constructor(entries: Iterable<readonly [string, string]> = []) {
    this.entriesByName = new Map(entries)
    Object.freeze(this)
  }

  get size(): number {
    return this.entriesByName.size
  }

  get(name: string): string | undefined {
    return this.entriesByName.get(name)
  }

  has(name: string): boolean {
    return this.entriesByName.has(name)
  }

  forEach(callback: (value: string, name: string, map: ReadonlyMap<string, string>) => void): void {
    for (const [name, value] of this.entriesByName) {
      callback(value, name, this)
    }
  }

  entries() {
    return this.entriesByName.entries()
  }

  keys() {
    return this.entriesByName.keys()
  }

  values() {
    return this.entriesByName.values()
  }

  [Symbol.iterator]() {
    return this.entriesByName[Symbol.iterator]()
  }
}
