/**
 * Event Channel - bounded FIFO with a single consumer
 *
 * Producers push synchronously; the consumer awaits receive(). Items from one
 * producer keep their push order. Capacity only bounds push(); pushUrgent() is
 * for completion events that must never be lost.
 */

export class EventChannel<T> {
  private queue: T[] = []
  private capacity: number
  private waiter: ((item: T | null) => void) | null = null
  private closed = false

  constructor(capacity = 512) {
    this.capacity = capacity
  }

  push(item: T): boolean {
    if (this.closed) return false
    if (!this.waiter && this.queue.length >= this.capacity) return false
    this.deliver(item)
    return true
  }

  pushUrgent(item: T): boolean {
    if (this.closed) return false
    this.deliver(item)
    return true
  }

  receive(): Promise<T | null> {
    const next = this.queue.shift()
    if (next !== undefined) return Promise.resolve(next)
    if (this.closed) return Promise.resolve(null)
    if (this.waiter) {
      return Promise.reject(new Error('EventChannel supports a single consumer'))
    }
    return new Promise(resolve => {
      this.waiter = resolve
    })
  }

  tryReceive(): T | undefined {
    return this.queue.shift()
  }

  close(): void {
    if (this.closed) return
    this.closed = true
    if (this.waiter) {
      const waiter = this.waiter
      this.waiter = null
      waiter(null)
    }
  }

  isClosed(): boolean {
    return this.closed
  }

  get size(): number {
    return this.queue.length
  }

  private deliver(item: T): void {
    if (this.waiter) {
      const waiter = this.waiter
      this.waiter = null
      waiter(item)
      return
    }
    this.queue.push(item)
  }
}
