/**
 * Fixed-capacity FIFO of packed MIDI messages.
 *
 * The engine pushes from its frame loop and the synth drains from its render
 * timer. A full queue rejects the push instead of growing.
 */
export class BoundedEventQueue {
  private readonly buffer: Uint32Array;
  private head = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
    this.buffer = new Uint32Array(capacity);
  }

  get size(): number {
    return this.count;
  }

  get isFull(): boolean {
    return this.count === this.capacity;
  }

  push(message: number): boolean {
    if (this.count === this.capacity) return false;
    this.buffer[(this.head + this.count) % this.capacity] = message >>> 0;
    this.count += 1;
    return true;
  }

  /**
   * Hand every queued message to `handler` in push order and empty the queue.
   * @returns number of messages drained
   */
  drain(handler: (message: number) => void): number {
    const drained = this.count;
    while (this.count > 0) {
      const message = this.buffer[this.head];
      this.head = (this.head + 1) % this.capacity;
      this.count -= 1;
      handler(message);
    }
    return drained;
  }

  clear(): void {
    this.head = 0;
    this.count = 0;
  }
}
