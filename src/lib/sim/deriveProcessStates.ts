import { IDLE, type ProcessRuntimeState, type SimulationResult } from "@/lib/types";

function pidList(values: string[] = []): string[] {
  return values.map((value) => value.trim()).filter((value) => value.length > 0 && value !== IDLE);
}

/** Process states as they stand once tick `t` has executed. */
export function deriveProcessStates(result: SimulationResult, t: number): Record<string, ProcessRuntimeState> {
  const out: Record<string, ProcessRuntimeState> = {};

  for (const record of result.ticks) {
    for (const pid of pidList([record.pid, ...record.readyQueue])) out[pid] = "READY";
  }
  for (const completion of result.completions) {
    out[completion.pid] = "READY";
  }

  const running = result.ticks[Math.floor(t)]?.pid;
  if (running && running !== IDLE) out[running] = "RUNNING";

  for (const completion of result.completions) {
    if (completion.completionTime <= t + 1) out[completion.pid] = "TERMINATED";
  }

  return out;
}
