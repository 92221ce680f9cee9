import type { FrameSnapshot, MemoryFrame, MemoryUsage } from "@/lib/memory/types";

export class PhysicalMemory {
  readonly totalFrames: number;

  private freeFrames = new Set<number>();

  private frames = new Map<number, MemoryFrame>();

  constructor(totalFrames: number) {
    this.totalFrames = Math.max(1, Math.floor(totalFrames));
    for (let pfn = 0; pfn < this.totalFrames; pfn += 1) {
      this.freeFrames.add(pfn);
    }
  }

  get freeCount(): number {
    return this.freeFrames.size;
  }

  /** Lowest free frame, or null when memory is full. */
  allocate(pid: string, vpn: number): number | null {
    let pfn: number | null = null;
    for (const candidate of this.freeFrames) {
      if (pfn === null || candidate < pfn) pfn = candidate;
    }
    if (pfn === null) return null;

    this.freeFrames.delete(pfn);
    this.frames.set(pfn, { pfn, pid, vpn });
    return pfn;
  }

  free(pfn: number, expectedPid: string, expectedVpn: number): boolean {
    const frame = this.frames.get(pfn);
    if (!frame || frame.pid !== expectedPid || frame.vpn !== expectedVpn) {
      return false;
    }
    this.frames.delete(pfn);
    this.freeFrames.add(pfn);
    return true;
  }

  frameInfo(pfn: number): MemoryFrame | undefined {
    const frame = this.frames.get(pfn);
    return frame ? { ...frame } : undefined;
  }

  isFree(pfn: number): boolean {
    return this.freeFrames.has(pfn);
  }

  framesOf(pid: string): number[] {
    return [...this.frames.values()]
      .filter((frame) => frame.pid === pid)
      .map((frame) => frame.pfn)
      .sort((a, b) => a - b);
  }

  usage(): MemoryUsage {
    return {
      total: this.totalFrames,
      used: this.frames.size,
      free: this.freeFrames.size,
    };
  }

  snapshot(): FrameSnapshot[] {
    return Array.from({ length: this.totalFrames }, (_, pfn) => {
      const frame = this.frames.get(pfn);
      return { pfn, pid: frame?.pid ?? null, vpn: frame?.vpn ?? null };
    });
  }
}
