export * from "@/lib/types";
export * from "@/lib/config";
export * from "@/lib/errors";
export * from "@/lib/logger";
export * from "@/lib/ids";
export * from "@/lib/memory";
export { SimProcess, createProcess, type ProcessContext } from "@/lib/process/process";
export { generateReferenceSequence } from "@/lib/process/referenceSequence";
export { Statistics, type StatisticsSnapshot } from "@/lib/sim/statistics";
export { CpuScheduler, type SchedulerOptions } from "@/lib/sim/scheduler";
export { runWithControls, type ControlledRunOptions } from "@/lib/sim/runner";
export {
  createSimulation,
  rerun,
  runSimulation,
  runSimulationWithControls,
  type Simulation,
  type SimulationConfig,
} from "@/lib/sim/simulation";
export { buildSegments, busyTicks, type Segment } from "@/lib/sim/gantt";
export { deriveProcessStates } from "@/lib/sim/deriveProcessStates";
export { getReplayMax, getReplayViewState, type ReplayViewState } from "@/lib/replay";
export { createControlStore, gateOpen, type ControlState, type ControlStoreApi } from "@/store/controlStore";
