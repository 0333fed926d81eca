export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function elapsed(startTime: number, now: number): string {
  return `${((now - startTime) / 1000).toFixed(2)}s`;
}
