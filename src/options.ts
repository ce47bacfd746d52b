import { OUTPUT_FILE } from "./config";
import { UsageError } from "./errors";

export type CliOptions = {
  rosterPath: string;
  meetingsPath: string;
  outPath: string;
  clamp: boolean;
  verbose: boolean;
};

type Env = Record<string, string | undefined>;

/** Flags that take a value, so their value is not mistaken for a positional. */
const VALUE_FLAGS = new Set(["--out"]);

/**
 * Value of `--out` (or another value flag), given as `--out path` or
 * `--out=path`. A following `--flag` is not taken as the value.
 */
export function getArgValue(args: readonly string[], flag: string): string | null {
  const idx = args.findIndex((a) => a === flag || a.startsWith(`${flag}=`));
  if (idx === -1) return null;
  const a = args[idx];
  if (a.includes("=")) return a.split("=").slice(1).join("=");
  const next = args[idx + 1];
  return next && !next.startsWith("--") ? next : null;
}

/** `--clamp` and `--verbose` are switches: any `--clamp=...` also turns it on. */
export function hasFlag(args: readonly string[], flag: string): boolean {
  return args.some((a) => a === flag || a.startsWith(`${flag}=`));
}

/**
 * `EXPOSURE_CLAMP` / `EXPOSURE_VERBOSE` switches. Anything other than 1, true
 * or yes (any case) is off.
 */
export function envFlag(env: Env, name: string): boolean {
  const v = env[name];
  if (!v) return false;
  return v === "1" || v.toLowerCase() === "true" || v.toLowerCase() === "yes";
}

/**
 * Collects the arguments that are neither flags nor flag values.
 */
export function getPositionals(args: readonly string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i += 1) {
    const a = args[i];
    if (a.startsWith("--")) {
      const next = args[i + 1];
      if (VALUE_FLAGS.has(a) && next !== undefined && !next.startsWith("--")) {
        i += 1;
      }
      continue;
    }
    out.push(a);
  }
  return out;
}

/**
 * Resolves CLI options from argv (without the node and script entries) and
 * the environment. Flags win over environment variables.
 *
 * Throws `UsageError` unless exactly two positionals are given.
 */
export function resolveOptions(args: readonly string[], env: Env): CliOptions {
  const positionals = getPositionals(args);
  if (positionals.length !== 2) {
    throw new UsageError(`expected 2 input paths, got ${positionals.length}`);
  }
  const [rosterPath, meetingsPath] = positionals;

  const outPath = getArgValue(args, "--out") || env.EXPOSURE_OUT || OUTPUT_FILE;
  const clamp = hasFlag(args, "--clamp") || envFlag(env, "EXPOSURE_CLAMP");
  const verbose = hasFlag(args, "--verbose") || envFlag(env, "EXPOSURE_VERBOSE");

  return { rosterPath, meetingsPath, outPath, clamp, verbose };
}
