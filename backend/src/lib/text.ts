import { CommandResult } from "../types/store";

export function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) : text;
}

/** stderr when there is any, otherwise stdout. */
export function diagnosticText(result: CommandResult): string {
  return result.stderr || result.stdout;
}

export function isSuccess(result: CommandResult): boolean {
  return result.code === 0;
}

/**
 * Idempotent-create check: a non-zero exit still counts when the tool says
 * the object is already there.
 */
export function isCreatedOrExists(result: CommandResult): boolean {
  if (result.code === 0) return true;
  return `${result.stderr}\n${result.stdout}`.toLowerCase().includes("already exists");
}
