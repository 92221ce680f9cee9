import { IDLE } from "@/lib/types";

export type Segment = {
  pid: string;
  start: number;
  end: number;
  len: number;
};

/** Run-length encodes an execution order into contiguous [start, end] slices. */
export function buildSegments(executionOrder: string[]): Segment[] {
  const segments: Segment[] = [];

  executionOrder.forEach((entry, t) => {
    const pid = entry || IDLE;
    const open = segments[segments.length - 1];
    if (open && open.pid === pid) {
      open.end = t;
      open.len += 1;
    } else {
      segments.push({ pid, start: t, end: t, len: 1 });
    }
  });

  return segments;
}

export function busyTicks(ticks: string[]): number {
  return ticks.filter((pid) => pid && pid !== IDLE).length;
}
