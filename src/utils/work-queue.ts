// Pull queue shared by the workers of a fetch phase.
// take() runs synchronously, so two workers can never receive the same item.
export class WorkQueue<T> {
  private items: T[];

  constructor(items: Iterable<T> = []) {
    this.items = [...items];
  }

  get size(): number {
    return this.items.length;
  }

  // Removes up to `max` items. An empty result means the queue is drained.
  take(max: number): T[] {
    if (max <= 0 || this.items.length == 0) {
      return [];
    }
    return this.items.splice(Math.max(this.items.length - max, 0));
  }

  // Drops the remaining work, used to stop sibling workers after a failure
  clear(): void {
    this.items = [];
  }
}
