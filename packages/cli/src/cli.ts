import { readFile, writeFile } from "node:fs/promises";
import { createConsoleLogger, generateRemix, InputError, isLoopwalkError } from "@loopwalk/core";
import type { Logger } from "@loopwalk/core";
import { parseCliArgs, USAGE } from "./args.js";
import { decodeWav, encodeWav } from "./wav.js";

export interface CliRuntime {
  /** Defaults to a console logger that writes to stderr */
  logger?: Logger;
  /** Receives the usage text for --help */
  print?: (text: string) => void;
}

async function readInput(path: string): Promise<Uint8Array> {
  try {
    return await readFile(path);
  } catch (error) {
    const code = error instanceof Error && "code" in error ? error.code : undefined;
    const reason = code === "ENOENT" ? "File not found" : "Cannot read file";
    throw new InputError(`${reason}: ${path}`, { cause: error });
  }
}

/**
 * Runs the command line and returns the process exit code.
 *
 * Remix errors (bad input, bad options, no beats, a rejected degenerate
 * graph) are reported through the logger and turn into exit code 1. Anything
 * else is a bug and propagates.
 */
export async function runCli(argv: string[], runtime: CliRuntime = {}): Promise<number> {
  const print = runtime.print ?? ((text: string) => console.log(text));
  let logger = runtime.logger ?? createConsoleLogger({ stderrOnly: true });

  try {
    const command = parseCliArgs(argv);
    if (command.kind === "help") {
      print(USAGE);
      return 0;
    }

    const { options } = command;
    if (!runtime.logger && options.quiet) {
      logger = createConsoleLogger({ stderrOnly: true, level: "warn" });
    }

    const input = decodeWav(await readInput(options.inputPath));
    const result = await generateRemix(input, options.remix, { logger });

    logger.info(`Saving to ${options.outputPath}...`);
    await writeFile(options.outputPath, encodeWav(result.output));
    logger.info(`Done! Replay with --seed ${result.meta.seed}`);
    return 0;
  } catch (error) {
    if (isLoopwalkError(error)) {
      logger.error(`${error.code}: ${error.message}`);
      return 1;
    }
    throw error;
  }
}
