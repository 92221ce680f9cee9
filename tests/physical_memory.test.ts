import { describe, expect, it } from "vitest";

import { PhysicalMemory } from "@/lib/memory/physicalMemory";

describe("PhysicalMemory", () => {
  it("hands out the lowest free frame until full", () => {
    const memory = new PhysicalMemory(3);
    expect(memory.allocate("P0", 0)).toBe(0);
    expect(memory.allocate("P0", 1)).toBe(1);
    expect(memory.allocate("P1", 0)).toBe(2);
    expect(memory.allocate("P1", 1)).toBeNull();
    expect(memory.usage()).toEqual({ total: 3, used: 3, free: 0 });
  });

  it("reuses a freed frame before higher ones", () => {
    const memory = new PhysicalMemory(3);
    memory.allocate("P0", 0);
    memory.allocate("P0", 1);
    expect(memory.free(0, "P0", 0)).toBe(true);
    expect(memory.allocate("P1", 7)).toBe(0);
    expect(memory.frameInfo(0)).toMatchObject({ pfn: 0, pid: "P1", vpn: 7 });
  });

  it("refuses to free a frame for the wrong owner", () => {
    const memory = new PhysicalMemory(2);
    memory.allocate("P0", 3);
    expect(memory.free(0, "P1", 3)).toBe(false);
    expect(memory.free(0, "P0", 2)).toBe(false);
    expect(memory.free(1, "P0", 3)).toBe(false);
    expect(memory.frameInfo(0)).toMatchObject({ pid: "P0", vpn: 3 });
  });

  it("treats a second free as stale", () => {
    const memory = new PhysicalMemory(2);
    memory.allocate("P0", 0);
    expect(memory.free(0, "P0", 0)).toBe(true);
    expect(memory.free(0, "P0", 0)).toBe(false);
    expect(memory.usage()).toEqual({ total: 2, used: 0, free: 2 });
  });

  it("keeps free and used frames summing to the total", () => {
    const memory = new PhysicalMemory(4);
    const ops: Array<() => void> = [
      () => memory.allocate("P0", 0),
      () => memory.allocate("P0", 1),
      () => memory.free(0, "P0", 0),
      () => memory.allocate("P1", 0),
      () => memory.allocate("P1", 1),
      () => memory.allocate("P1", 2),
      () => memory.free(3, "P1", 2),
    ];
    for (const op of ops) {
      op();
      const usage = memory.usage();
      expect(usage.free + usage.used).toBe(4);
    }
    expect(memory.framesOf("P1")).toEqual([0, 2]);
    expect(memory.isFree(3)).toBe(true);
  });

  it("snapshots owners per frame", () => {
    const memory = new PhysicalMemory(2);
    memory.allocate("P0", 5);
    expect(memory.snapshot()).toEqual([
      { pfn: 0, pid: "P0", vpn: 5 },
      { pfn: 1, pid: null, vpn: null },
    ]);
  });
});
