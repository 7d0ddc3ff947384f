export type QueuedItem = {
  runId: string
  priority: number
  threadScope: string | null
}

// Ordered by priority (higher first), then enqueue order.
export class CommandQueue<T extends QueuedItem> {
  private readonly queue: T[] = []

  get size() {
    return this.queue.length
  }

  enqueue(item: T): void {
    // insert after every item of equal or higher priority
    const index = this.queue.findIndex((existing) => existing.priority < item.priority)
    if (index === -1) {
      this.queue.push(item)
    } else {
      this.queue.splice(index, 0, item)
    }
  }

  /** Removes every item and returns them in queue order. */
  drain(): T[] {
    return this.queue.splice(0, this.queue.length)
  }

  /** Removes and returns the first item, in queue order, accepted by `predicate`. */
  takeFirst(predicate: (item: T) => boolean): T | undefined {
    const index = this.queue.findIndex(predicate)
    if (index === -1) return undefined
    const [item] = this.queue.splice(index, 1)
    return item
  }

  remove(runId: string): T | undefined {
    return this.takeFirst((item) => item.runId === runId)
  }

  items(): T[] {
    return [...this.queue]
  }
}
