import type { CompletionRecord } from "@/lib/types";

export interface StatisticsSnapshot {
  completed: number;
  totalWaiting: number;
  totalTurnaround: number;
  hits: number;
  faults: number;
  contextSwitches: number;
}

export class Statistics {
  private records: CompletionRecord[] = [];

  private totalWaiting = 0;

  private totalTurnaround = 0;

  private hits = 0;

  private faults = 0;

  private switches = 0;

  get completedCount(): number {
    return this.records.length;
  }

  get contextSwitches(): number {
    return this.switches;
  }

  recordCompletion(record: CompletionRecord): void {
    this.records.push({ ...record });
    this.totalWaiting += record.waiting;
    this.totalTurnaround += record.turnaround;
    this.hits += record.hits;
    this.faults += record.faults;
  }

  /** Round Robin preemptions only; a completion-triggered dispatch is not a switch. */
  recordContextSwitch(): void {
    this.switches += 1;
  }

  averageWaiting(): number {
    return this.records.length > 0 ? this.totalWaiting / this.records.length : 0;
  }

  averageTurnaround(): number {
    return this.records.length > 0 ? this.totalTurnaround / this.records.length : 0;
  }

  overallHitRatio(): number {
    const total = this.hits + this.faults;
    return total > 0 ? this.hits / total : 0;
  }

  completions(): CompletionRecord[] {
    return this.records.map((record) => ({ ...record }));
  }

  snapshot(): StatisticsSnapshot {
    return {
      completed: this.records.length,
      totalWaiting: this.totalWaiting,
      totalTurnaround: this.totalTurnaround,
      hits: this.hits,
      faults: this.faults,
      contextSwitches: this.switches,
    };
  }

  reset(): void {
    this.records = [];
    this.totalWaiting = 0;
    this.totalTurnaround = 0;
    this.hits = 0;
    this.faults = 0;
    this.switches = 0;
  }
}
