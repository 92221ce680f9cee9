import type { ReplacementPolicy } from "@/lib/memory/types";

/** Frames in load order. */
class LoadQueue {
  private items = new Set<number>();

  get size() {
    return this.items.size;
  }

  enqueue(pfn: number) {
    this.items.delete(pfn);
    this.items.add(pfn);
  }

  dequeueOldest(): number | null {
    for (const pfn of this.items) {
      this.items.delete(pfn);
      return pfn;
    }
    return null;
  }

  remove(pfn: number): boolean {
    return this.items.delete(pfn);
  }

  toArray(): number[] {
    return [...this.items];
  }

  clear() {
    this.items.clear();
  }
}

export class FifoPolicy implements ReplacementPolicy {
  readonly algorithm = "FIFO" as const;

  private queue = new LoadQueue();

  get size(): number {
    return this.queue.size;
  }

  recordLoad(pfn: number): void {
    this.queue.enqueue(pfn);
  }

  // Load order only: hits leave the queue alone.
  recordHit(): void {}

  selectVictim(): number | null {
    return this.queue.dequeueOldest();
  }

  remove(pfn: number): boolean {
    return this.queue.remove(pfn);
  }

  order(): number[] {
    return this.queue.toArray();
  }

  clear(): void {
    this.queue.clear();
  }
}
