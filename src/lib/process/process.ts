import { DEFAULT_SEED, pagesForSize, validateProcessDescriptor } from "@/lib/config";
import { ExhaustedReferenceSequenceError, PageRangeError } from "@/lib/errors";
import type { IdGenerator } from "@/lib/ids";
import { parseAddress, translate, type Translation } from "@/lib/memory/address";
import type { AccessStatus, PageTableEntry } from "@/lib/memory/types";
import { generateReferenceSequence } from "@/lib/process/referenceSequence";
import type { ProcessDescriptor, ProcessRuntimeState } from "@/lib/types";

export interface ProcessContext {
  nextId: IdGenerator;
  seed?: string;
}

export class SimProcess {
  readonly id: string;

  readonly name: string;

  readonly burstTotal: number;

  readonly sizeKb: number;

  readonly sizeInPages: number;

  readonly instructions: readonly string[];

  readonly referenceSequence: readonly number[];

  readonly pageTable = new Map<number, PageTableEntry>();

  remainingTime: number;

  state: ProcessRuntimeState = "READY";

  arrivalTime = 0;

  completionTime: number | null = null;

  pageHits = 0;

  pageFaults = 0;

  private cursor = 0;

  constructor(id: string, descriptor: ProcessDescriptor, seed: string = DEFAULT_SEED) {
    validateProcessDescriptor(descriptor);

    this.id = id;
    this.name = descriptor.name.trim();
    this.burstTotal = descriptor.burstTime;
    this.remainingTime = descriptor.burstTime;
    this.sizeKb = descriptor.sizeKb;
    this.sizeInPages = pagesForSize(descriptor.sizeKb);
    this.instructions = [...(descriptor.instructions ?? [])];

    if (descriptor.addresses) {
      this.referenceSequence = descriptor.addresses.map((raw) => {
        const address = parseAddress(raw);
        this.assertPageInRange(translate(address).vpn);
        return address;
      });
    } else {
      this.referenceSequence = generateReferenceSequence(this.burstTotal, this.sizeInPages, `${seed}:${id}`);
    }

    this.invalidateAll();
  }

  get position(): number {
    return this.cursor;
  }

  get referencesExhausted(): boolean {
    return this.cursor >= this.referenceSequence.length;
  }

  get isFinished(): boolean {
    return this.remainingTime === 0 || this.referencesExhausted;
  }

  /** Symbolic instruction for the unit about to execute, if one was given. */
  get currentInstruction(): string | undefined {
    return this.instructions[this.burstTotal - this.remainingTime];
  }

  get hitRatio(): number {
    const total = this.pageHits + this.pageFaults;
    return total > 0 ? this.pageHits / total : 0;
  }

  nextReference(): number {
    const address = this.referenceSequence[this.cursor];
    if (address === undefined) {
      throw new ExhaustedReferenceSequenceError(this.id, this.referenceSequence.length);
    }
    this.cursor += 1;
    return address;
  }

  executeOneUnit(): boolean {
    if (this.remainingTime <= 0) return false;
    this.remainingTime -= 1;
    return true;
  }

  translate(virtualAddress: number): Translation {
    return translate(virtualAddress);
  }

  assertPageInRange(vpn: number): void {
    if (!Number.isInteger(vpn) || vpn < 0 || vpn >= this.sizeInPages) {
      throw new PageRangeError(this.id, vpn, this.sizeInPages);
    }
  }

  lookup(vpn: number): number | null {
    const entry = this.pageTable.get(vpn);
    return entry?.valid ? entry.pfn : null;
  }

  mapPage(vpn: number, pfn: number): void {
    this.pageTable.set(vpn, { vpn, pfn, valid: true });
  }

  unmapPage(vpn: number): void {
    this.pageTable.set(vpn, { vpn, pfn: null, valid: false });
  }

  residentPages(): Array<{ vpn: number; pfn: number }> {
    const out: Array<{ vpn: number; pfn: number }> = [];
    for (const entry of this.pageTable.values()) {
      if (entry.valid && entry.pfn !== null) out.push({ vpn: entry.vpn, pfn: entry.pfn });
    }
    return out;
  }

  invalidateAll(): void {
    for (let vpn = 0; vpn < this.sizeInPages; vpn += 1) {
      this.unmapPage(vpn);
    }
  }

  recordAccess(status: AccessStatus): void {
    if (status === "HIT") {
      this.pageHits += 1;
    } else {
      this.pageFaults += 1;
    }
  }

  resetForNewRun(): void {
    this.remainingTime = this.burstTotal;
    this.cursor = 0;
    this.state = "READY";
    this.arrivalTime = 0;
    this.completionTime = null;
    this.pageHits = 0;
    this.pageFaults = 0;
    this.invalidateAll();
  }
}

export function createProcess(descriptor: ProcessDescriptor, context: ProcessContext): SimProcess {
  validateProcessDescriptor(descriptor);
  return new SimProcess(context.nextId(), descriptor, context.seed);
}
