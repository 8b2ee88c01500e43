export interface Queue<T> {
  /**
   * Add an item; returns false when the queue is full and the item was dropped
   */
  enqueue(item: T): boolean;
  dequeueBatch(maxItems: number): T[];
  size(): number;
}
