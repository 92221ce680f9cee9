import { describe, expect, it } from "vitest";

import { Statistics } from "@/lib/sim/statistics";
import type { CompletionRecord } from "@/lib/types";

function completion(overrides: Partial<CompletionRecord>): CompletionRecord {
  return {
    pid: "P0",
    name: "job",
    arrivalTime: 0,
    completionTime: 0,
    burstTime: 1,
    turnaround: 0,
    waiting: 0,
    hits: 0,
    faults: 0,
    ...overrides,
  };
}

describe("Statistics", () => {
  it("reports zeros before any completion", () => {
    const stats = new Statistics();
    expect(stats.averageWaiting()).toBe(0);
    expect(stats.averageTurnaround()).toBe(0);
    expect(stats.overallHitRatio()).toBe(0);
    expect(stats.completedCount).toBe(0);
  });

  it("averages over completions and pools page accesses", () => {
    const stats = new Statistics();
    stats.recordCompletion(completion({ pid: "P0", turnaround: 4, waiting: 1, hits: 3, faults: 1 }));
    stats.recordCompletion(completion({ pid: "P1", turnaround: 8, waiting: 5, hits: 0, faults: 4 }));

    expect(stats.averageTurnaround()).toBe(6);
    expect(stats.averageWaiting()).toBe(3);
    expect(stats.overallHitRatio()).toBe(3 / 8);
    expect(stats.completions().map((record) => record.pid)).toEqual(["P0", "P1"]);
  });

  it("counts context switches separately and resets everything", () => {
    const stats = new Statistics();
    stats.recordContextSwitch();
    stats.recordContextSwitch();
    stats.recordCompletion(completion({ turnaround: 2, hits: 1 }));
    expect(stats.contextSwitches).toBe(2);

    stats.reset();
    expect(stats.contextSwitches).toBe(0);
    expect(stats.completedCount).toBe(0);
    expect(stats.overallHitRatio()).toBe(0);
  });

  it("exposes the running totals", () => {
    const stats = new Statistics();
    stats.recordContextSwitch();
    stats.recordCompletion(completion({ pid: "P0", turnaround: 5, waiting: 2, hits: 1, faults: 3 }));
    stats.recordCompletion(completion({ pid: "P1", turnaround: 7, waiting: 4, hits: 2, faults: 2 }));

    expect(stats.snapshot()).toEqual({
      completed: 2,
      totalWaiting: 6,
      totalTurnaround: 12,
      hits: 3,
      faults: 5,
      contextSwitches: 1,
    });
    stats.reset();
    expect(stats.snapshot()).toEqual({
      completed: 0,
      totalWaiting: 0,
      totalTurnaround: 0,
      hits: 0,
      faults: 0,
      contextSwitches: 0,
    });
  });

  it("hands out copies of its records", () => {
    const stats = new Statistics();
    stats.recordCompletion(completion({ waiting: 2 }));
    const [first] = stats.completions();
    if (first) first.waiting = 99;
    expect(stats.completions()[0]?.waiting).toBe(2);
  });
});
