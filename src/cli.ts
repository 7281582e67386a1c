/**
 * Command-line parsing and failure messages for export.ts.
 */

import { AuthError, RemoteError, WindowComputationError } from "./errors";

export interface CliOptions {
  mode?: string;
  configPath?: string;
  concurrency?: number;
  noCache: boolean;
  skipReport: boolean;
  sequential: boolean;
}

export const USAGE =
  "Usage: tsx export.ts [--mode default|last30|lastmonth] [--config path] [--concurrency N] " +
  "[--sequential] [--no-cache] [--skip-report]";

export class UsageError extends Error {
  override readonly name = "UsageError";
}

const VALUE_FLAGS = ["--mode", "--config", "--concurrency"] as const;
const SWITCHES = ["--no-cache", "--skip-report", "--sequential"] as const;

function isKnownFlag(arg: string): boolean {
  return VALUE_FLAGS.some((f) => f === arg) || SWITCHES.some((f) => f === arg);
}

export function parseCliArgs(args: readonly string[]): CliOptions {
  function getArg(flag: string): string | undefined {
    const idx = args.indexOf(flag);
    if (idx < 0) return undefined;
    const value = args[idx + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new UsageError(`${flag} requires a value`);
    }
    return value;
  }

  for (const [i, arg] of args.entries()) {
    const previous = i > 0 ? args[i - 1] : undefined;
    const isValue = previous !== undefined && VALUE_FLAGS.some((f) => f === previous);
    if (!isValue && !isKnownFlag(arg)) {
      throw new UsageError(`Unknown argument "${arg}"`);
    }
  }

  const concurrencyArg = getArg("--concurrency");
  let concurrency: number | undefined;
  if (concurrencyArg !== undefined) {
    concurrency = Number(concurrencyArg);
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new UsageError(`--concurrency must be a positive integer, got "${concurrencyArg}"`);
    }
  }

  return {
    mode: getArg("--mode"),
    configPath: getArg("--config"),
    concurrency,
    noCache: args.includes("--no-cache"),
    skipReport: args.includes("--skip-report"),
    sequential: args.includes("--sequential"),
  };
}

/**
 * One-line message for a run that ended in an expected failure, or null when
 * the error is a bug that should surface with its stack.
 */
export function describeFailure(err: unknown, aborted: boolean): string | null {
  if (aborted) return "Export aborted; user cache left unchanged.";
  if (err instanceof AuthError) return `Authentication failed: ${err.message}`;
  if (err instanceof WindowComputationError) return `Could not compute export window: ${err.message}`;
  if (err instanceof RemoteError) return `Zendesk request failed: ${err.message}`;
  return null;
}
