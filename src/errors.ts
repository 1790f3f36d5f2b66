export type HardwareOperation = "open" | "read" | "write" | "close";

export class HardwareError extends Error {
  readonly lightIndex: number | null;
  readonly operation: HardwareOperation;

  constructor(message: string, params: { lightIndex: number | null; operation: HardwareOperation; cause?: unknown }) {
    super(message, { cause: params.cause });
    this.name = "HardwareError";
    this.lightIndex = params.lightIndex;
    this.operation = params.operation;
  }
}

export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
