import type { AddressedAccessResult, FrameSnapshot, MemoryAlgorithm, MemoryStats, MemoryUsage } from "@/lib/memory/types";

export type Algorithm = "FCFS" | "RR";
export type ProcessRuntimeState = "READY" | "RUNNING" | "TERMINATED";

export const IDLE = "IDLE";

export interface ProcessDescriptor {
  name: string;
  burstTime: number;
  sizeKb: number;
  instructions?: string[];
  addresses?: Array<number | string>;
}

export interface TickRecord {
  t: number;
  pid: string;
  access?: AddressedAccessResult;
  instruction?: string;
  readyQueue: string[];
  frames: FrameSnapshot[];
}

export interface CompletionRecord {
  pid: string;
  name: string;
  arrivalTime: number;
  completionTime: number;
  burstTime: number;
  turnaround: number;
  waiting: number;
  hits: number;
  faults: number;
}

export type SimulationEvent =
  | { type: "dispatch"; t: number; pid: string; quantum: number | null }
  | { type: "preempt"; t: number; pid: string }
  | { type: "complete"; t: number; pid: string; record: CompletionRecord }
  | { type: "tick"; t: number; record: TickRecord };

export interface SimulationObserver {
  onEvent(event: SimulationEvent): void;
}

export interface SimulationSummary {
  totalTime: number;
  completedProcessCount: number;
  averageWaitingTime: number;
  averageTurnaroundTime: number;
  contextSwitches: number;
  overallHitRatio: number;
}

export interface MemoryReport {
  algorithm: MemoryAlgorithm;
  usage: MemoryUsage;
  stats: MemoryStats;
  frames: FrameSnapshot[];
}

export interface SimulationResult {
  algorithm: Algorithm;
  timeQuantum: number | null;
  summary: SimulationSummary;
  executionOrder: string[];
  ticks: TickRecord[];
  completions: CompletionRecord[];
  memory?: MemoryReport;
}

export interface SchedulerStatus {
  algorithm: Algorithm;
  timeQuantum: number | null;
  clock: number;
  running: string | null;
  readyQueue: string[];
  completed: number;
  quantumRemaining: number | null;
}

export function describeEvent(event: SimulationEvent): string {
  switch (event.type) {
    case "dispatch":
      return `t=${event.t}: ${event.pid} READY -> RUNNING`;
    case "preempt":
      return `t=${event.t}: ${event.pid} RUNNING -> READY (time slice)`;
    case "complete":
      return `t=${event.t}: ${event.pid} RUNNING -> TERMINATED (tat=${event.record.turnaround}, wt=${event.record.waiting})`;
    case "tick": {
      const access = event.record.access;
      if (!access) return `t=${event.t}: ${event.record.pid}`;
      const evicted = access.evicted ? ` evict ${access.evicted.pid}:${access.evicted.vpn}` : "";
      return `t=${event.t}: ${event.record.pid} page ${access.vpn} ${access.status} -> frame ${access.pfn}${evicted}`;
    }
  }
}
