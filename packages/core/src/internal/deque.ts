const COMPACT_THRESHOLD = 1024

/**
 * Array-backed FIFO with amortised O(1) `shift`. The consumed head is
 * compacted away once it outgrows the live part.
 */
export class Deque<T> implements Iterable<T> {
  #items: T[] = []
  #head = 0

  get length(): number {
    return this.#items.length - this.#head
  }

  push(...values: T[]): void {
    this.#items.push(...values)
  }

  peek(): T | undefined {
    return this.#items[this.#head]
  }

  shift(): T | undefined {
    if (this.#head >= this.#items.length) {
      return undefined
    }
    const value = this.#items[this.#head]
    this.#head += 1
    if (this.#head >= COMPACT_THRESHOLD && this.#head * 2 >= this.#items.length) {
      this.#items = this.#items.slice(this.#head)
      this.#head = 0
    }
    return value
  }

  clear(): void {
    this.#items = []
    this.#head = 0
  }

  *[Symbol.iterator](): Iterator<T> {
    yield* this.#items.slice(this.#head)
  }
}
