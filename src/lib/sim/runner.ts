import { setTimeout as delay } from "node:timers/promises";

import type { CpuScheduler } from "@/lib/sim/scheduler";
import type { SimulationResult } from "@/lib/types";
import { gateOpen, type ControlStoreApi } from "@/store/controlStore";

export interface ControlledRunOptions {
  control?: ControlStoreApi;
  sleep?: (ms: number) => Promise<unknown>;
  maxTicks?: number;
}

function waitForGate(control: ControlStoreApi): Promise<void> {
  if (gateOpen(control.getState())) return Promise.resolve();
  return new Promise((resolve) => {
    const unsubscribe = control.subscribe((state) => {
      if (!gateOpen(state)) return;
      unsubscribe();
      resolve();
    });
  });
}

/**
 * Drives the scheduler tick by tick, checking the control store at every tick
 * boundary. Gates and delays only change when ticks run, never what they produce.
 */
export async function runWithControls(
  scheduler: CpuScheduler,
  options: ControlledRunOptions = {},
): Promise<SimulationResult> {
  const { control } = options;
  const sleep = options.sleep ?? ((ms: number) => delay(ms));
  const maxTicks = options.maxTicks ?? Number.POSITIVE_INFINITY;
  let executed = 0;

  while (!scheduler.isComplete() && executed < maxTicks) {
    if (control) {
      await waitForGate(control);
      const state = control.getState();
      if (state.stopped) break;
      state.consumeStep();
    }

    scheduler.step();
    executed += 1;

    const delayMs = control?.getState().delayMs ?? 0;
    if (delayMs > 0) {
      await sleep(delayMs);
    }
  }

  return scheduler.result();
}
