export function formatError(code: string, message: string): string {
  return `[${code}] ${message}`;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
