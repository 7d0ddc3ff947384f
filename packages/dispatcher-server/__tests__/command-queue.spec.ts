// @vitest-environment node
import { describe, it, expect } from 'vitest'
import { CommandQueue, type QueuedItem } from '../src/services/command-queue'

const item = (runId: string, priority: number, threadScope: string | null = null): QueuedItem => ({
  runId,
  priority,
  threadScope
})

describe('CommandQueue', () => {
  it('orders by priority, then by enqueue order', () => {
    const queue = new CommandQueue<QueuedItem>()
    queue.enqueue(item('a', 0))
    queue.enqueue(item('b', 2))
    queue.enqueue(item('c', 0))
    queue.enqueue(item('d', 2))
    queue.enqueue(item('e', -1))

    expect(queue.items().map((entry) => entry.runId)).toEqual(['b', 'd', 'a', 'c', 'e'])
    expect(queue.size).toBe(5)
  })

  it('takes the first matching item without disturbing the rest', () => {
    const queue = new CommandQueue<QueuedItem>()
    queue.enqueue(item('a', 1, 'story-1'))
    queue.enqueue(item('b', 1, 'story-1'))
    queue.enqueue(item('c', 0, 'story-2'))

    expect(queue.takeFirst((entry) => entry.threadScope !== 'story-1')?.runId).toBe('c')
    expect(queue.items().map((entry) => entry.runId)).toEqual(['a', 'b'])
  })

  it('removes items by run id', () => {
    const queue = new CommandQueue<QueuedItem>()
    queue.enqueue(item('a', 0))
    queue.enqueue(item('b', 0))

    expect(queue.remove('a')?.runId).toBe('a')
    expect(queue.remove('a')).toBeUndefined()
    expect(queue.items().map((entry) => entry.runId)).toEqual(['b'])
    expect(queue.size).toBe(1)
  })

  it('drains every item in queue order', () => {
    const queue = new CommandQueue<QueuedItem>()
    queue.enqueue(item('a', 0))
    queue.enqueue(item('b', 3))

    expect(queue.drain().map((entry) => entry.runId)).toEqual(['b', 'a'])
    expect(queue.size).toBe(0)
    expect(queue.drain()).toEqual([])
  })
})
