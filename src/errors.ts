export class FetchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FetchError";
  }
}

export class DiffError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DiffError";
  }
}

export class EngineError extends Error {
  readonly exitCode: number | null;
  readonly log: string;

  constructor(message: string, exitCode: number | null, log: string) {
    super(message);
    this.name = "EngineError";
    this.exitCode = exitCode;
    this.log = log;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
