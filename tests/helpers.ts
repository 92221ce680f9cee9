import { expect } from "vitest";

import type { MemoryManager } from "@/lib/memory/memoryManager";
import type { SimProcess } from "@/lib/process/process";

/** Frame conservation plus page-table/frame-table agreement in both directions. */
export function expectConsistent(manager: MemoryManager, processes: SimProcess[]) {
  const usage = manager.usage();
  expect(usage.free + usage.used).toBe(usage.total);

  const byId = new Map(processes.map((process) => [process.id, process]));
  for (const process of processes) {
    for (const { vpn, pfn } of process.residentPages()) {
      const frame = manager.physical.frameInfo(pfn);
      expect(frame?.pid).toBe(process.id);
      expect(frame?.vpn).toBe(vpn);
    }
  }
  for (const frame of manager.snapshotFrames()) {
    if (frame.pid === null || frame.vpn === null) continue;
    expect(byId.get(frame.pid)?.lookup(frame.vpn)).toBe(frame.pfn);
  }
}
