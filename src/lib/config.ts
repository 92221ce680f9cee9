import { ConfigurationError } from "@/lib/errors";
import type { MemoryAlgorithm } from "@/lib/memory/types";
import type { Algorithm, ProcessDescriptor } from "@/lib/types";

export const PAGE_SIZE = 4096;
export const KB = 1024;

export const DEFAULT_TIME_QUANTUM = 3;
export const DEFAULT_FRAME_COUNT = 16;
export const DEFAULT_REPLACEMENT_ALGORITHM: MemoryAlgorithm = "FIFO";
export const DEFAULT_SEED = "pagesched";

export const SCHEDULING_ALGORITHMS: readonly Algorithm[] = ["FCFS", "RR"];
export const REPLACEMENT_ALGORITHMS: readonly MemoryAlgorithm[] = ["FIFO", "LRU"];

export interface SchedulerConfigInput {
  algorithm: string;
  timeQuantum?: number;
}

export type SchedulerConfig =
  | { algorithm: "FCFS"; timeQuantum: null }
  | { algorithm: "RR"; timeQuantum: number };

export interface MemoryConfigInput {
  totalFrames?: number;
  algorithm?: string;
}

export interface MemoryConfig {
  totalFrames: number;
  algorithm: MemoryAlgorithm;
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value > 0;
}

function matchName<T extends string>(value: string, options: readonly T[]): T | undefined {
  const upper = value.trim().toUpperCase();
  return options.find((option) => option === upper);
}

export function resolveSchedulerConfig(input: SchedulerConfigInput): SchedulerConfig {
  const algorithm = matchName(String(input.algorithm ?? ""), SCHEDULING_ALGORITHMS);
  if (!algorithm) {
    throw new ConfigurationError(
      `Unsupported scheduling algorithm "${input.algorithm}" (expected ${SCHEDULING_ALGORITHMS.join(" or ")})`,
    );
  }
  if (algorithm === "FCFS") {
    return { algorithm, timeQuantum: null };
  }

  const quantum = input.timeQuantum ?? DEFAULT_TIME_QUANTUM;
  if (!isPositiveInteger(quantum)) {
    throw new ConfigurationError(`Time quantum must be a positive integer, got ${input.timeQuantum}`);
  }
  return { algorithm, timeQuantum: quantum };
}

export function resolveMemoryConfig(input: MemoryConfigInput = {}): MemoryConfig {
  const algorithm = matchName(String(input.algorithm ?? DEFAULT_REPLACEMENT_ALGORITHM), REPLACEMENT_ALGORITHMS);
  if (!algorithm) {
    throw new ConfigurationError(
      `Unsupported replacement algorithm "${input.algorithm}" (expected ${REPLACEMENT_ALGORITHMS.join(" or ")})`,
    );
  }

  const totalFrames = input.totalFrames ?? DEFAULT_FRAME_COUNT;
  if (!isPositiveInteger(totalFrames)) {
    throw new ConfigurationError(`Frame count must be a positive integer, got ${input.totalFrames}`);
  }
  return { totalFrames, algorithm };
}

export function framesForMemorySize(sizeKb: number): number {
  return Math.floor((sizeKb * KB) / PAGE_SIZE);
}

export function pagesForSize(sizeKb: number): number {
  return Math.ceil((sizeKb * KB) / PAGE_SIZE);
}

export function validateProcessDescriptor(descriptor: ProcessDescriptor): void {
  if (typeof descriptor.name !== "string" || descriptor.name.trim().length === 0) {
    throw new ConfigurationError("Process name must not be empty");
  }
  if (!isPositiveInteger(descriptor.burstTime)) {
    throw new ConfigurationError(`${descriptor.name}: burst time must be a positive integer, got ${descriptor.burstTime}`);
  }
  if (!isPositiveInteger(descriptor.sizeKb)) {
    throw new ConfigurationError(`${descriptor.name}: size must be a positive integer (KB), got ${descriptor.sizeKb}`);
  }
  if (descriptor.addresses && descriptor.addresses.length === 0) {
    throw new ConfigurationError(`${descriptor.name}: address list must not be empty when given`);
  }
}
