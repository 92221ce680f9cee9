export class SimulatorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends SimulatorError {}

export class AddressFormatError extends SimulatorError {
  readonly input: unknown;

  constructor(input: unknown, reason = "not a non-negative integer or hex string") {
    super(`Invalid address ${JSON.stringify(input)}: ${reason}`);
    this.input = input;
  }
}

export class PageRangeError extends SimulatorError {
  readonly pid: string;

  readonly vpn: number;

  constructor(pid: string, vpn: number, pageCount: number) {
    super(`Page ${vpn} is outside ${pid}'s address space (${pageCount} pages)`);
    this.pid = pid;
    this.vpn = vpn;
  }
}

export class ExhaustedReferenceSequenceError extends SimulatorError {
  constructor(pid: string, length: number) {
    super(`${pid} has no references left (sequence length ${length})`);
  }
}

/**
 * Frame bookkeeping no longer adds up: memory is full yet the replacement policy
 * tracks no frame to evict, or a victim frame has no registered owner.
 */
export class FrameAccountingError extends SimulatorError {}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
