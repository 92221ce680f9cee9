import type { SchedulerConfig } from "@/lib/config";
import { ConfigurationError } from "@/lib/errors";
import { silentLogger, type Logger } from "@/lib/logger";
import type { MemoryManager } from "@/lib/memory/memoryManager";
import type { AddressedAccessResult } from "@/lib/memory/types";
import type { SimProcess } from "@/lib/process/process";
import { Statistics } from "@/lib/sim/statistics";
import {
  describeEvent,
  IDLE,
  type CompletionRecord,
  type SchedulerStatus,
  type SimulationEvent,
  type SimulationObserver,
  type SimulationResult,
  type TickRecord,
} from "@/lib/types";

export interface SchedulerOptions {
  memory?: MemoryManager;
  observer?: SimulationObserver;
  logger?: Logger;
}

/**
 * Tick engine. Each `step()` selects a process, issues at most one memory
 * reference for it, executes one unit of work and advances the clock by one.
 */
export class CpuScheduler {
  readonly config: SchedulerConfig;

  readonly statistics = new Statistics();

  private readonly memory: MemoryManager | undefined;

  private readonly observer: SimulationObserver | undefined;

  private readonly logger: Logger;

  private readyQueue: SimProcess[] = [];

  private current: SimProcess | null = null;

  private quantumRemaining = 0;

  private clock = 0;

  private executionOrder: string[] = [];

  private ticks: TickRecord[] = [];

  private completed: SimProcess[] = [];

  constructor(config: SchedulerConfig, options: SchedulerOptions = {}) {
    this.config = config;
    this.memory = options.memory;
    this.observer = options.observer;
    this.logger = options.logger ?? silentLogger;
  }

  get time(): number {
    return this.clock;
  }

  addProcess(process: SimProcess, arrivalTime: number = this.clock): void {
    if (process.state === "TERMINATED") {
      throw new ConfigurationError(`${process.id} has terminated; reset it before enqueuing again`);
    }
    if (process === this.current || this.readyQueue.includes(process)) {
      throw new ConfigurationError(`${process.id} is already scheduled`);
    }

    process.state = "READY";
    process.arrivalTime = arrivalTime;
    this.readyQueue.push(process);
    this.memory?.register(process);
  }

  isComplete(): boolean {
    return this.readyQueue.length === 0 && this.current === null;
  }

  step(): TickRecord {
    const t = this.clock;
    this.select(t);

    const process = this.current;
    if (!process) {
      this.clock += 1;
      this.executionOrder.push(IDLE);
      return this.emitTick({ t, pid: IDLE, readyQueue: [], frames: this.memory?.snapshotFrames() ?? [] });
    }

    const instruction = process.currentInstruction;
    let access: AddressedAccessResult | undefined;
    if (this.memory && !process.referencesExhausted) {
      access = this.memory.accessByAddress(process, process.nextReference());
    }

    process.executeOneUnit();
    if (this.config.algorithm === "RR") {
      this.quantumRemaining -= 1;
    }
    this.clock += 1;
    this.executionOrder.push(process.id);

    const record: TickRecord = {
      t,
      pid: process.id,
      readyQueue: this.readyQueue.map((queued) => queued.id),
      frames: this.memory?.snapshotFrames() ?? [],
      ...(access ? { access } : {}),
      ...(instruction !== undefined ? { instruction } : {}),
    };
    this.emitTick(record);

    // Completion is settled on the tick it happens, so an expired quantum never
    // preempts a process that has already finished.
    if (process.remainingTime === 0 || (this.memory && process.referencesExhausted)) {
      this.complete(process);
    }
    return record;
  }

  run(): SimulationResult {
    this.logger.info(`${this.config.algorithm} run started`, {
      processes: this.readyQueue.map((process) => process.id),
      quantum: this.config.timeQuantum,
    });
    while (!this.isComplete()) {
      this.step();
    }
    const result = this.result();
    this.logger.info(`${this.config.algorithm} run finished`, { ...result.summary });
    return result;
  }

  result(): SimulationResult {
    return {
      algorithm: this.config.algorithm,
      timeQuantum: this.config.timeQuantum,
      summary: {
        totalTime: this.clock,
        completedProcessCount: this.statistics.completedCount,
        averageWaitingTime: this.statistics.averageWaiting(),
        averageTurnaroundTime: this.statistics.averageTurnaround(),
        contextSwitches: this.statistics.contextSwitches,
        overallHitRatio: this.statistics.overallHitRatio(),
      },
      executionOrder: [...this.executionOrder],
      ticks: [...this.ticks],
      completions: this.statistics.completions(),
      ...(this.memory ? { memory: this.memory.report() } : {}),
    };
  }

  status(): SchedulerStatus {
    const rr = this.config.algorithm === "RR";
    return {
      algorithm: this.config.algorithm,
      timeQuantum: this.config.timeQuantum,
      clock: this.clock,
      running: this.current?.id ?? null,
      readyQueue: this.readyQueue.map((process) => process.id),
      completed: this.completed.length,
      quantumRemaining: rr ? this.quantumRemaining : null,
    };
  }

  reset(): void {
    if (this.memory) {
      for (const process of [...this.readyQueue, ...(this.current ? [this.current] : [])]) {
        this.memory.deallocateProcess(process);
      }
    }
    this.readyQueue = [];
    this.current = null;
    this.quantumRemaining = 0;
    this.clock = 0;
    this.executionOrder = [];
    this.ticks = [];
    this.completed = [];
    this.statistics.reset();
  }

  private select(t: number) {
    const current = this.current;
    if (current && this.config.algorithm === "RR" && this.quantumRemaining <= 0) {
      current.state = "READY";
      this.readyQueue.push(current);
      this.current = null;
      this.statistics.recordContextSwitch();
      this.emit({ type: "preempt", t, pid: current.id });
    }

    if (this.current) return;

    const next = this.readyQueue.shift();
    if (!next) return;

    next.state = "RUNNING";
    this.current = next;
    this.quantumRemaining = this.config.timeQuantum ?? 0;
    this.emit({ type: "dispatch", t, pid: next.id, quantum: this.config.timeQuantum });
  }

  private complete(process: SimProcess) {
    const completionTime = this.clock;
    const turnaround = completionTime - process.arrivalTime;

    process.state = "TERMINATED";
    process.completionTime = completionTime;
    this.current = null;
    this.completed.push(process);

    const record: CompletionRecord = {
      pid: process.id,
      name: process.name,
      arrivalTime: process.arrivalTime,
      completionTime,
      burstTime: process.burstTotal,
      turnaround,
      // Charged against the full burst even when references ran out first.
      waiting: turnaround - process.burstTotal,
      hits: process.pageHits,
      faults: process.pageFaults,
    };
    this.statistics.recordCompletion(record);
    this.memory?.deallocateProcess(process);
    this.emit({ type: "complete", t: completionTime, pid: process.id, record });
  }

  private emitTick(record: TickRecord): TickRecord {
    this.ticks.push(record);
    this.emit({ type: "tick", t: record.t, record });
    return record;
  }

  private emit(event: SimulationEvent) {
    this.logger.debug(describeEvent(event));
    this.observer?.onEvent(event);
  }
}
