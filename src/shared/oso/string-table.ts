/**
 * Per-parse string arena. Every name, key and string value is routed through
 * `intern`, so repeated occurrences share one stored string.
 */
export class StringTable {
  private readonly strings = new Map<string, string>();

  intern(s: string): string {
    const existing = this.strings.get(s);
    if (existing !== undefined) return existing;
    this.strings.set(s, s);
    return s;
  }

  has(s: string): boolean {
    return this.strings.has(s);
  }

  /** Number of distinct strings interned so far */
  get size(): number {
    return this.strings.size;
  }
}
