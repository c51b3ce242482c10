/**
 * Unbounded FIFO hand-off from the acquisition loop to the render loop.
 * Both sides run on the event loop, so put and drainAll never interleave.
 */
export class SampleQueue<T> {
  private items: T[] = [];

  get size(): number {
    return this.items.length;
  }

  put(item: T): void {
    this.items.push(item);
  }

  drainAll(): T[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }
}
