// src/cli-util.ts
import { InvalidArgumentError, type Command } from "commander";
import { errorMessage } from "./util.js";

/** True when `mod` is the script node was started with. */
export function isDirectRun(mod: NodeModule): boolean {
  return require.main === mod;
}

/**
 * Parse argv and run the program if `mod` was run directly; do nothing when
 * it was merely imported. A returned number becomes the exit code.
 */
export function cliEntrypoint(
  mod: NodeModule,
  buildProgram: () => Command,
  opts?: { label?: string },
): void {
  if (!isDirectRun(mod)) return;
  const program = buildProgram();
  program.parseAsync(process.argv).then(
    () => undefined,
    (err: unknown) => {
      const label = opts?.label || program.name() || "command";
      const msg = err instanceof Error && err.stack ? err.stack : errorMessage(err);
      console.error(`${label} fatal:\n${msg}`);
      process.exitCode = 1;
    },
  );
}

export function parseIntOption(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError("expected a non-negative integer");
  }
  return n;
}
