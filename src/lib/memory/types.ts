export type MemoryAlgorithm = "FIFO" | "LRU";

export type AccessStatus = "HIT" | "FAULT";

export interface FrameOwner {
  pid: string;
  vpn: number;
}

export interface MemoryFrame extends FrameOwner {
  pfn: number;
}

export type FrameSnapshot = {
  pfn: number;
  pid: string | null;
  vpn: number | null;
};

export interface PageTableEntry {
  vpn: number;
  pfn: number | null;
  valid: boolean;
}

export interface EvictedPage extends FrameOwner {
  pfn: number;
}

export interface AccessResult {
  status: AccessStatus;
  pid: string;
  vpn: number;
  pfn: number;
  evicted?: EvictedPage;
}

export interface AddressedAccessResult extends AccessResult {
  virtualAddress: number;
  offset: number;
  physicalAddress: number;
}

export interface MemoryUsage {
  total: number;
  used: number;
  free: number;
}

export interface MemoryStats {
  accesses: number;
  hits: number;
  faults: number;
  hitRatio: number;
}

export interface DeallocationReport {
  framesFreed: number[];
  pagesFreed: number[];
}

/**
 * Frame-level bookkeeping for a replacement algorithm. Frames enter on load,
 * leave through eviction or process teardown.
 */
export interface ReplacementPolicy {
  readonly algorithm: MemoryAlgorithm;
  readonly size: number;
  recordLoad(pfn: number): void;
  recordHit(pfn: number): void;
  selectVictim(): number | null;
  remove(pfn: number): boolean;
  /** Tracked frames, next victim first. */
  order(): number[];
  clear(): void;
}

export type MemStep = {
  t: number;
  vpn: number;
  status: AccessStatus;
  pfn: number;
  frames: Array<number | null>;
  evicted?: number;
};

export type MemResult = {
  algorithm: MemoryAlgorithm;
  steps: MemStep[];
  faults: number;
  hits: number;
  hitRatio: number;
};
