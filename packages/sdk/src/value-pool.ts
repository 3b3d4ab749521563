/**
 * Interning table for strings repeated across many descriptors
 * (media types, encodings, extensions)
 *
 * A registry owns one pool and hands it to every descriptor it constructs,
 * so descriptors built by the same registry share one instance per value.
 */
export class ValuePool {
  #values = new Map<string, string>();

  /**
   * Return the pooled instance equal to `value`, pooling it on first sight
   */
  intern(value: string): string {
    const pooled = this.#values.get(value);
    if (pooled !== undefined) {
      return pooled;
    }

    this.#values.set(value, value);
    return value;
  }

  has(value: string): boolean {
    return this.#values.has(value);
  }

  get size(): number {
    return this.#values.size;
  }
}
