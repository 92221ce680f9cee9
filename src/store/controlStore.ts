import { createStore } from "zustand/vanilla";

type ControlStore = {
  paused: boolean;
  stepMode: boolean;
  pendingSteps: number;
  delayMs: number;
  stopped: boolean;
  pause: () => void;
  resume: () => void;
  setStepMode: (enabled: boolean) => void;
  step: (count?: number) => void;
  consumeStep: () => boolean;
  setDelay: (ms: number) => void;
  stop: () => void;
  reset: () => void;
};

export type ControlState = Pick<ControlStore, "paused" | "stepMode" | "pendingSteps" | "delayMs" | "stopped">;

const INITIAL: ControlState = {
  paused: false,
  stepMode: false,
  pendingSteps: 0,
  delayMs: 0,
  stopped: false,
};

export function createControlStore(initial: Partial<ControlState> = {}) {
  return createStore<ControlStore>((set, get) => ({
    ...INITIAL,
    ...initial,
    pause: () => set({ paused: true }),
    resume: () => set({ paused: false }),
    setStepMode: (enabled) =>
      set((state) => ({
        stepMode: enabled,
        pendingSteps: enabled ? state.pendingSteps : 0,
      })),
    step: (count = 1) =>
      set((state) => ({
        pendingSteps: state.pendingSteps + Math.max(0, Math.floor(count)),
      })),
    consumeStep: () => {
      const { stepMode, pendingSteps } = get();
      if (!stepMode) return true;
      if (pendingSteps <= 0) return false;
      set({ pendingSteps: pendingSteps - 1 });
      return true;
    },
    setDelay: (ms) => set({ delayMs: Math.max(0, Math.floor(ms)) }),
    stop: () => set({ stopped: true }),
    reset: () => set({ ...INITIAL }),
  }));
}

export type ControlStoreApi = ReturnType<typeof createControlStore>;

/** True when the run loop may execute its next tick, or must stop. */
export function gateOpen(state: ControlState): boolean {
  if (state.stopped) return true;
  if (state.paused) return false;
  return !state.stepMode || state.pendingSteps > 0;
}
