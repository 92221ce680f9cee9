import seedrandom from "seedrandom";

import { PAGE_SIZE } from "@/lib/config";

const LOCALITY = 0.7;

/**
 * Virtual addresses with locality of reference: most steps stay on or next to
 * the previous page, the rest jump anywhere in the address space.
 */
export function generateReferenceSequence(length: number, pageCount: number, seed: string): number[] {
  const rng = seedrandom(seed);
  const pick = (n: number) => Math.floor(rng() * n);

  const pages = Math.max(1, Math.floor(pageCount));
  const out: number[] = [];
  let current = 0;

  for (let i = 0; i < length; i += 1) {
    if (rng() < LOCALITY && pages > 1) {
      const nearby = [current - 1, current, current + 1].filter((vpn) => vpn >= 0 && vpn < pages);
      current = nearby[pick(nearby.length)] ?? current;
    } else {
      current = pick(pages);
    }
    out.push(current * PAGE_SIZE + pick(PAGE_SIZE));
  }

  return out;
}
