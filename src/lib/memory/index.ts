import { KB, PAGE_SIZE, resolveMemoryConfig } from "@/lib/config";
import { MemoryManager } from "@/lib/memory/memoryManager";
import type { MemResult, MemStep, MemoryAlgorithm } from "@/lib/memory/types";
import { SimProcess } from "@/lib/process/process";

export * from "@/lib/memory/types";
export { createReplacementPolicy, MemoryManager } from "@/lib/memory/memoryManager";
export { PhysicalMemory } from "@/lib/memory/physicalMemory";
export { FifoPolicy } from "@/lib/memory/fifo";
export { LruPolicy } from "@/lib/memory/lru";
export { formatAddress, parseAddress, toPhysicalAddress, translate } from "@/lib/memory/address";

/**
 * Runs a bare page-reference string through a fresh memory manager owned by a
 * single synthetic process. Frame contents are reported as page numbers.
 */
export function runReplacement(algorithm: MemoryAlgorithm, framesCount: number, refs: number[]): MemResult {
  const config = resolveMemoryConfig({ algorithm, totalFrames: framesCount });
  const pages = refs.map((ref) => Math.max(0, Math.floor(ref)));
  if (pages.length === 0) {
    return { algorithm: config.algorithm, steps: [], faults: 0, hits: 0, hitRatio: 0 };
  }

  const pageCount = Math.max(...pages) + 1;
  const process = new SimProcess("REF", {
    name: "reference-string",
    burstTime: pages.length,
    sizeKb: Math.ceil((pageCount * PAGE_SIZE) / KB),
    addresses: pages.map((vpn) => vpn * PAGE_SIZE),
  });
  const manager = new MemoryManager(config);

  const steps: MemStep[] = pages.map((vpn, t) => {
    const result = manager.access(process, vpn);
    return {
      t,
      vpn,
      status: result.status,
      pfn: result.pfn,
      frames: manager.snapshotFrames().map((frame) => frame.vpn),
      ...(result.evicted ? { evicted: result.evicted.vpn } : {}),
    };
  });

  const { hits, faults, hitRatio } = manager.stats();
  return { algorithm: config.algorithm, steps, faults, hits, hitRatio };
}

export function compareReplacement(framesCount: number, refs: number[]): Record<MemoryAlgorithm, MemResult> {
  return {
    FIFO: runReplacement("FIFO", framesCount, refs),
    LRU: runReplacement("LRU", framesCount, refs),
  };
}

export function parseReferenceString(input: string): number[] {
  return input
    .split(/[,\s]+/)
    .map((value) => value.trim())
    .filter(Boolean)
    .map((value) => Number.parseInt(value, 10))
    .filter((value) => Number.isFinite(value))
    .map((value) => Math.max(0, value));
}
