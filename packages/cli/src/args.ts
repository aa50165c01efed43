import { parseArgs } from "node:util";
import { ConfigurationError } from "@loopwalk/core";
import type { RemixOptions } from "@loopwalk/core";

export const USAGE = `Usage: loopwalk <input.wav> [options]

Generate an endless remix of a song by walking its beat similarity graph.

Options:
  -o, --output <path>       Output WAV file (default: infinite.wav)
  -d, --duration <minutes>  Target duration in minutes (default: 5)
  -t, --threshold <value>   Similarity threshold, lower is stricter (default: 60)
  -p, --prob <value>        Branch probability from 0.0 to 1.0 (default: 0.5)
  -s, --seed <integer>      Seed for a reproducible walk (default: random)
      --strict              Fail when no beat pair is similar enough
  -q, --quiet               Only report warnings and errors
  -h, --help                Show this message`;

export interface CliOptions {
  inputPath: string;
  outputPath: string;
  remix: RemixOptions;
  quiet: boolean;
}

export type ParsedCommand = { kind: "help" } | { kind: "run"; options: CliOptions };

const DEFAULT_OUTPUT = "infinite.wav";
const DEFAULT_DURATION_MINUTES = 5;

function parseNumber(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value)) {
    throw new ConfigurationError(`--${flag} expects a number, got "${raw}"`);
  }
  return value;
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        output: { type: "string", short: "o" },
        duration: { type: "string", short: "d" },
        threshold: { type: "string", short: "t" },
        prob: { type: "string", short: "p" },
        seed: { type: "string", short: "s" },
        strict: { type: "boolean" },
        quiet: { type: "boolean", short: "q" },
        help: { type: "boolean", short: "h" }
      }
    });
  } catch (error) {
    throw new ConfigurationError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Parses command-line arguments (without the node and script entries).
 *
 * Value ranges are checked later by the option resolver; this only turns
 * strings into numbers and minutes into seconds.
 */
export function parseCliArgs(argv: string[]): ParsedCommand {
  const { values, positionals } = readArgs(argv);
  if (values.help) {
    return { kind: "help" };
  }
  if (positionals.length !== 1) {
    throw new ConfigurationError(
      positionals.length === 0 ? "Missing input file" : `Expected one input file, got ${positionals.length}`
    );
  }

  const durationMinutes = parseNumber("duration", values.duration) ?? DEFAULT_DURATION_MINUTES;
  const remix: RemixOptions = {
    targetDurationSeconds: durationMinutes * 60,
    threshold: parseNumber("threshold", values.threshold),
    branchProbability: parseNumber("prob", values.prob),
    seed: parseNumber("seed", values.seed),
    degenerateGraph: values.strict ? "reject" : "warn"
  };

  return {
    kind: "run",
    options: {
      inputPath: positionals[0],
      outputPath: values.output ?? DEFAULT_OUTPUT,
      remix,
      quiet: values.quiet ?? false
    }
  };
}
