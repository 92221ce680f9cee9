import { describe, expect, it } from "vitest";

import { AddressFormatError } from "@/lib/errors";
import { formatAddress, parseAddress, toPhysicalAddress, translate } from "@/lib/memory/address";

describe("address parsing and translation", () => {
  it("accepts hex strings, decimal strings and integers", () => {
    expect(parseAddress("0x1000")).toBe(4096);
    expect(parseAddress("0XfF")).toBe(255);
    expect(parseAddress(" 0x10 ")).toBe(16);
    expect(parseAddress("4096")).toBe(4096);
    expect(parseAddress(8191)).toBe(8191);
  });

  it.each(["0x", "12ab", "-1", "", "0x1g", "1.5"])("rejects %j", (input) => {
    expect(() => parseAddress(input)).toThrow(AddressFormatError);
  });

  it("rejects negative and fractional numbers", () => {
    expect(() => parseAddress(-1)).toThrow(AddressFormatError);
    expect(() => parseAddress(1.5)).toThrow(AddressFormatError);
  });

  it("splits an address into page number and offset", () => {
    expect(translate(0x1234)).toEqual({ vpn: 1, offset: 0x234 });
    expect(translate(4096)).toEqual({ vpn: 1, offset: 0 });
    expect(translate(4095)).toEqual({ vpn: 0, offset: 4095 });
  });

  it("builds physical addresses from frame and offset", () => {
    expect(toPhysicalAddress(3, 0x10)).toBe(0x3010);
  });

  it("renders fixed-width upper-case hex", () => {
    expect(formatAddress(4096)).toBe("0x1000");
    expect(formatAddress(0x234)).toBe("0x0234");
    expect(formatAddress(0xabcde)).toBe("0xABCDE");
    expect(formatAddress(1, 8)).toBe("0x00000001");
  });
});
