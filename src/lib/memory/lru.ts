import type { ReplacementPolicy } from "@/lib/memory/types";

type RecencyNode = {
  pfn: number;
  older: RecencyNode | null;
  newer: RecencyNode | null;
};

class RecencyList {
  private oldest: RecencyNode | null = null;

  private newest: RecencyNode | null = null;

  pushNewest(node: RecencyNode) {
    node.older = this.newest;
    node.newer = null;
    if (this.newest) {
      this.newest.newer = node;
    } else {
      this.oldest = node;
    }
    this.newest = node;
  }

  unlink(node: RecencyNode) {
    if (node.older) node.older.newer = node.newer;
    if (node.newer) node.newer.older = node.older;
    if (this.oldest === node) this.oldest = node.newer;
    if (this.newest === node) this.newest = node.older;
    node.older = null;
    node.newer = null;
  }

  shiftOldest(): RecencyNode | null {
    const node = this.oldest;
    if (node) this.unlink(node);
    return node;
  }

  frames(): number[] {
    const out: number[] = [];
    for (let node = this.oldest; node; node = node.newer) {
      out.push(node.pfn);
    }
    return out;
  }
}

/** Recency list over frames: head is least recently used, tail most recent. */
export class LruPolicy implements ReplacementPolicy {
  readonly algorithm = "LRU" as const;

  private nodeMap = new Map<number, RecencyNode>();

  private list = new RecencyList();

  get size(): number {
    return this.nodeMap.size;
  }

  recordLoad(pfn: number): void {
    this.touch(pfn);
  }

  recordHit(pfn: number): void {
    this.touch(pfn);
  }

  selectVictim(): number | null {
    const victim = this.list.shiftOldest();
    if (!victim) return null;
    this.nodeMap.delete(victim.pfn);
    return victim.pfn;
  }

  remove(pfn: number): boolean {
    const node = this.nodeMap.get(pfn);
    if (!node) return false;
    this.list.unlink(node);
    this.nodeMap.delete(pfn);
    return true;
  }

  order(): number[] {
    return this.list.frames();
  }

  clear(): void {
    this.nodeMap.clear();
    this.list = new RecencyList();
  }

  private touch(pfn: number) {
    const existing = this.nodeMap.get(pfn);
    if (existing) {
      this.list.unlink(existing);
      this.list.pushNewest(existing);
      return;
    }
    const node: RecencyNode = { pfn, older: null, newer: null };
    this.nodeMap.set(pfn, node);
    this.list.pushNewest(node);
  }
}
