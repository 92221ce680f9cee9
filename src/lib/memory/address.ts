import { PAGE_SIZE } from "@/lib/config";
import { AddressFormatError } from "@/lib/errors";

const HEX_RE = /^0x[0-9a-f]+$/i;
const DEC_RE = /^\d+$/;

export interface Translation {
  vpn: number;
  offset: number;
}

export function parseAddress(input: number | string): number {
  if (typeof input === "number") {
    if (!Number.isSafeInteger(input) || input < 0) {
      throw new AddressFormatError(input);
    }
    return input;
  }

  const text = input.trim();
  let value: number;
  if (HEX_RE.test(text)) {
    value = Number.parseInt(text.slice(2), 16);
  } else if (DEC_RE.test(text)) {
    value = Number.parseInt(text, 10);
  } else {
    throw new AddressFormatError(input);
  }

  if (!Number.isSafeInteger(value)) {
    throw new AddressFormatError(input, "too large");
  }
  return value;
}

export function translate(address: number): Translation {
  return {
    vpn: Math.floor(address / PAGE_SIZE),
    offset: address % PAGE_SIZE,
  };
}

export function toPhysicalAddress(pfn: number, offset: number): number {
  return pfn * PAGE_SIZE + offset;
}

export function formatAddress(address: number, width = 4): string {
  return `0x${address.toString(16).toUpperCase().padStart(width, "0")}`;
}
