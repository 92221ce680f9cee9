import type { MemoryConfig } from "@/lib/config";
import { FrameAccountingError } from "@/lib/errors";
import { silentLogger, type Logger } from "@/lib/logger";
import { parseAddress, toPhysicalAddress, translate } from "@/lib/memory/address";
import { FifoPolicy } from "@/lib/memory/fifo";
import { LruPolicy } from "@/lib/memory/lru";
import { PhysicalMemory } from "@/lib/memory/physicalMemory";
import type {
  AccessResult,
  AddressedAccessResult,
  DeallocationReport,
  EvictedPage,
  FrameSnapshot,
  MemoryAlgorithm,
  MemoryStats,
  MemoryUsage,
  ReplacementPolicy,
} from "@/lib/memory/types";
import type { SimProcess } from "@/lib/process/process";
import type { MemoryReport } from "@/lib/types";

export function createReplacementPolicy(algorithm: MemoryAlgorithm): ReplacementPolicy {
  if (algorithm === "FIFO") return new FifoPolicy();
  return new LruPolicy();
}

export class MemoryManager {
  readonly algorithm: MemoryAlgorithm;

  readonly physical: PhysicalMemory;

  private policy: ReplacementPolicy;

  private processes = new Map<string, SimProcess>();

  private hits = 0;

  private faults = 0;

  private logger: Logger;

  constructor(config: MemoryConfig, logger: Logger = silentLogger) {
    this.algorithm = config.algorithm;
    this.physical = new PhysicalMemory(config.totalFrames);
    this.policy = createReplacementPolicy(config.algorithm);
    this.logger = logger;
  }

  register(process: SimProcess): void {
    this.processes.set(process.id, process);
  }

  access(process: SimProcess, vpn: number): AccessResult {
    process.assertPageInRange(vpn);
    this.register(process);

    const resident = process.lookup(vpn);
    if (resident !== null) {
      this.policy.recordHit(resident);
      this.count(process, "HIT");
      return { status: "HIT", pid: process.id, vpn, pfn: resident };
    }

    let evicted: EvictedPage | undefined;
    let pfn = this.physical.allocate(process.id, vpn);
    if (pfn === null) {
      evicted = this.evict();
      pfn = this.physical.allocate(process.id, vpn);
      if (pfn === null) {
        throw new FrameAccountingError(`Frame ${evicted.pfn} was freed but could not be reallocated`);
      }
    }

    process.mapPage(vpn, pfn);
    this.policy.recordLoad(pfn);
    this.count(process, "FAULT");

    return evicted
      ? { status: "FAULT", pid: process.id, vpn, pfn, evicted }
      : { status: "FAULT", pid: process.id, vpn, pfn };
  }

  accessByAddress(process: SimProcess, address: number | string): AddressedAccessResult {
    const virtualAddress = parseAddress(address);
    const { vpn, offset } = translate(virtualAddress);
    process.assertPageInRange(vpn);

    const result = this.access(process, vpn);
    return {
      ...result,
      virtualAddress,
      offset,
      physicalAddress: toPhysicalAddress(result.pfn, offset),
    };
  }

  deallocateProcess(process: SimProcess): DeallocationReport {
    const framesFreed: number[] = [];
    const pagesFreed: number[] = [];

    for (const { vpn, pfn } of process.residentPages()) {
      if (this.physical.free(pfn, process.id, vpn)) {
        this.policy.remove(pfn);
        framesFreed.push(pfn);
        pagesFreed.push(vpn);
      }
    }

    process.invalidateAll();
    this.processes.delete(process.id);

    if (framesFreed.length > 0) {
      this.logger.debug(`Freed ${framesFreed.length} frames of ${process.id}`, { frames: framesFreed });
    }
    return { framesFreed, pagesFreed };
  }

  stats(): MemoryStats {
    const accesses = this.hits + this.faults;
    return {
      accesses,
      hits: this.hits,
      faults: this.faults,
      hitRatio: accesses > 0 ? this.hits / accesses : 0,
    };
  }

  usage(): MemoryUsage {
    return this.physical.usage();
  }

  snapshotFrames(): FrameSnapshot[] {
    return this.physical.snapshot();
  }

  /** Tracked frames, next victim first. */
  policyOrder(): number[] {
    return this.policy.order();
  }

  report(): MemoryReport {
    return {
      algorithm: this.algorithm,
      usage: this.usage(),
      stats: this.stats(),
      frames: this.snapshotFrames(),
    };
  }

  resetStatistics(): void {
    this.hits = 0;
    this.faults = 0;
  }

  private count(process: SimProcess, status: "HIT" | "FAULT") {
    if (status === "HIT") {
      this.hits += 1;
    } else {
      this.faults += 1;
    }
    process.recordAccess(status);
  }

  private evict(): EvictedPage {
    const victim = this.policy.selectVictim();
    if (victim === null) {
      throw new FrameAccountingError(
        `No victim available: ${this.physical.freeCount} free of ${this.physical.totalFrames} frames, ${this.algorithm} tracks none`,
      );
    }

    const owner = this.physical.frameInfo(victim);
    if (!owner) {
      throw new FrameAccountingError(`${this.algorithm} selected frame ${victim}, which is not allocated`);
    }

    const ownerProcess = this.processes.get(owner.pid);
    if (!ownerProcess) {
      throw new FrameAccountingError(`Frame ${victim} belongs to ${owner.pid}, which is not registered`);
    }

    ownerProcess.unmapPage(owner.vpn);
    if (!this.physical.free(victim, owner.pid, owner.vpn)) {
      throw new FrameAccountingError(`Frame ${victim} changed owner during eviction`);
    }

    this.logger.debug(`Evicted ${owner.pid} page ${owner.vpn} from frame ${victim}`);
    return { pid: owner.pid, vpn: owner.vpn, pfn: victim };
  }
}
