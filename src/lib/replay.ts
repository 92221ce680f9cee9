import type { AddressedAccessResult, FrameSnapshot } from "@/lib/memory/types";
import { deriveProcessStates } from "@/lib/sim/deriveProcessStates";
import { IDLE, type ProcessRuntimeState, type SimulationResult } from "@/lib/types";

const RECENT_ACCESS_LIMIT = 20;

export interface ReplayViewState {
  time: number;
  running: string;
  readyQueue: string[];
  frames: FrameSnapshot[];
  recentAccesses: AddressedAccessResult[];
  completed: string[];
  states: Record<string, ProcessRuntimeState>;
}

export function getReplayMax(result: SimulationResult): number {
  return Math.max(result.ticks.length - 1, 0);
}

export function getReplayViewState(result: SimulationResult, requestedT: number): ReplayViewState {
  const replayMax = getReplayMax(result);
  const t = Math.max(0, Math.min(Math.floor(requestedT), replayMax));
  const record = result.ticks[t];

  const recentAccesses = result.ticks
    .slice(0, t + 1)
    .flatMap((tick) => (tick.access ? [tick.access] : []))
    .slice(-RECENT_ACCESS_LIMIT);

  return {
    time: t,
    running: record?.pid ?? IDLE,
    readyQueue: record ? [...record.readyQueue] : [],
    frames: record ? record.frames.map((frame) => ({ ...frame })) : [],
    recentAccesses,
    completed: result.completions
      .filter((completion) => completion.completionTime <= t + 1)
      .map((completion) => completion.pid),
    states: deriveProcessStates(result, t),
  };
}
