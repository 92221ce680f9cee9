import {
  DEFAULT_SEED,
  resolveMemoryConfig,
  resolveSchedulerConfig,
  validateProcessDescriptor,
  type MemoryConfig,
  type MemoryConfigInput,
  type SchedulerConfig,
  type SchedulerConfigInput,
} from "@/lib/config";
import { createIdGenerator, type IdGenerator } from "@/lib/ids";
import { silentLogger, type Logger } from "@/lib/logger";
import { MemoryManager } from "@/lib/memory/memoryManager";
import { createProcess, type SimProcess } from "@/lib/process/process";
import { runWithControls, type ControlledRunOptions } from "@/lib/sim/runner";
import { CpuScheduler } from "@/lib/sim/scheduler";
import type { ProcessDescriptor, SimulationObserver, SimulationResult } from "@/lib/types";

export interface SimulationConfig {
  scheduler: SchedulerConfigInput;
  /** Omit to run the scheduler without paging. */
  memory?: MemoryConfigInput;
  seed?: string;
  nextId?: IdGenerator;
  observer?: SimulationObserver;
  logger?: Logger;
}

export interface Simulation {
  schedulerConfig: SchedulerConfig;
  memoryConfig: MemoryConfig | null;
  processes: SimProcess[];
  scheduler: CpuScheduler;
  memory: MemoryManager | null;
  options: Pick<SimulationConfig, "observer" | "logger">;
}

function wire(
  schedulerConfig: SchedulerConfig,
  memoryConfig: MemoryConfig | null,
  processes: SimProcess[],
  options: Pick<SimulationConfig, "observer" | "logger">,
): Simulation {
  const logger = options.logger ?? silentLogger;
  const memory = memoryConfig ? new MemoryManager(memoryConfig, logger) : null;
  const scheduler = new CpuScheduler(schedulerConfig, {
    logger,
    ...(memory ? { memory } : {}),
    ...(options.observer ? { observer: options.observer } : {}),
  });
  for (const process of processes) {
    scheduler.addProcess(process, 0);
  }
  return { schedulerConfig, memoryConfig, processes, scheduler, memory, options };
}

/** Resolves every input before anything is built; a bad config builds nothing. */
export function createSimulation(config: SimulationConfig, descriptors: ProcessDescriptor[]): Simulation {
  const schedulerConfig = resolveSchedulerConfig(config.scheduler);
  const memoryConfig = config.memory ? resolveMemoryConfig(config.memory) : null;
  descriptors.forEach(validateProcessDescriptor);

  const context = {
    nextId: config.nextId ?? createIdGenerator(),
    seed: config.seed ?? DEFAULT_SEED,
  };
  const processes = descriptors.map((descriptor) => createProcess(descriptor, context));

  return wire(schedulerConfig, memoryConfig, processes, {
    ...(config.observer ? { observer: config.observer } : {}),
    ...(config.logger ? { logger: config.logger } : {}),
  });
}

export function runSimulation(config: SimulationConfig, descriptors: ProcessDescriptor[]): SimulationResult {
  return createSimulation(config, descriptors).scheduler.run();
}

export function runSimulationWithControls(
  config: SimulationConfig,
  descriptors: ProcessDescriptor[],
  options: ControlledRunOptions = {},
): Promise<SimulationResult> {
  return runWithControls(createSimulation(config, descriptors).scheduler, options);
}

/** Same processes, fresh scheduler and memory: an independent second run. */
export function rerun(simulation: Simulation): Simulation {
  for (const process of simulation.processes) {
    process.resetForNewRun();
  }
  return wire(simulation.schedulerConfig, simulation.memoryConfig, simulation.processes, simulation.options);
}
