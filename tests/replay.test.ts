import { describe, expect, it } from "vitest";

import { getReplayMax, getReplayViewState } from "@/lib/replay";
import { deriveProcessStates } from "@/lib/sim/deriveProcessStates";
import { buildSegments, busyTicks } from "@/lib/sim/gantt";
import { runSimulation } from "@/lib/sim/simulation";

const roundRobin = runSimulation({ scheduler: { algorithm: "RR", timeQuantum: 3 } }, [
  { name: "a", burstTime: 5, sizeKb: 4 },
  { name: "b", burstTime: 4, sizeKb: 4 },
]);

const paged = runSimulation(
  { scheduler: { algorithm: "FCFS" }, memory: { algorithm: "FIFO", totalFrames: 2 } },
  [
    { name: "a", burstTime: 2, sizeKb: 4, addresses: ["0x0010", "0x0020"] },
    { name: "b", burstTime: 2, sizeKb: 8, addresses: ["0x0000", "0x1004"] },
  ],
);

describe("getReplayViewState", () => {
  it("reports the running process and the queue behind it", () => {
    expect(getReplayMax(roundRobin)).toBe(8);

    const view = getReplayViewState(roundRobin, 3);
    expect(view.time).toBe(3);
    expect(view.running).toBe("P1");
    expect(view.readyQueue).toEqual(["P0"]);
    expect(view.completed).toEqual([]);
    expect(view.states).toEqual({ P0: "READY", P1: "RUNNING" });
  });

  it("marks processes finished by the end of the tick", () => {
    const view = getReplayViewState(roundRobin, 7);
    expect(view.running).toBe("P0");
    expect(view.completed).toEqual(["P0"]);
    expect(view.states).toEqual({ P0: "TERMINATED", P1: "READY" });
  });

  it("clamps the requested time into the recorded range", () => {
    expect(getReplayViewState(roundRobin, 99).time).toBe(8);
    expect(getReplayViewState(roundRobin, 99).completed).toEqual(["P0", "P1"]);
    expect(getReplayViewState(roundRobin, -4).time).toBe(0);
  });

  it("shows frames as they stood before a finishing process released them", () => {
    const view = getReplayViewState(paged, 1);
    expect(view.frames).toEqual([
      { pfn: 0, pid: "P0", vpn: 0 },
      { pfn: 1, pid: null, vpn: null },
    ]);
    expect(view.recentAccesses.map((access) => access.status)).toEqual(["FAULT", "HIT"]);
  });

  it("collects accesses up to the requested tick", () => {
    const view = getReplayViewState(paged, 3);
    expect(view.recentAccesses).toHaveLength(4);
    expect(view.recentAccesses[3]).toMatchObject({
      pid: "P1",
      vpn: 1,
      pfn: 1,
      offset: 4,
      virtualAddress: 0x1004,
      physicalAddress: 0x1004,
    });
    expect(view.frames).toEqual([
      { pfn: 0, pid: "P1", vpn: 0 },
      { pfn: 1, pid: "P1", vpn: 1 },
    ]);
  });
});

describe("deriveProcessStates", () => {
  it("marks the process on the first tick as running", () => {
    expect(deriveProcessStates(roundRobin, 0)).toEqual({ P0: "RUNNING", P1: "READY" });
  });
});

describe("buildSegments", () => {
  it("run-length encodes the execution order", () => {
    expect(buildSegments(roundRobin.executionOrder)).toEqual([
      { pid: "P0", start: 0, end: 2, len: 3 },
      { pid: "P1", start: 3, end: 5, len: 3 },
      { pid: "P0", start: 6, end: 7, len: 2 },
      { pid: "P1", start: 8, end: 8, len: 1 },
    ]);
  });

  it("keeps idle stretches as their own segments", () => {
    const order = ["IDLE", "IDLE", "P0", "IDLE"];
    expect(buildSegments(order)).toEqual([
      { pid: "IDLE", start: 0, end: 1, len: 2 },
      { pid: "P0", start: 2, end: 2, len: 1 },
      { pid: "IDLE", start: 3, end: 3, len: 1 },
    ]);
    expect(busyTicks(order)).toBe(1);
    expect(buildSegments([])).toEqual([]);
  });
});
