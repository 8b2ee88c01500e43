import type { Queue } from './base.js';

export class InMemoryQueue<T> implements Queue<T> {
  private items: T[] = [];

  constructor(private readonly capacity = Number.POSITIVE_INFINITY) {}

  enqueue(item: T): boolean {
    if (this.items.length >= this.capacity) {
      return false;
    }
    this.items.push(item);
    return true;
  }

  dequeueBatch(maxItems: number): T[] {
    if (this.items.length === 0) return [];
    return this.items.splice(0, maxItems);
  }

  size(): number {
    return this.items.length;
  }
}
