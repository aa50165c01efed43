export { runCli } from "./cli.js";
export type { CliRuntime } from "./cli.js";
export { parseCliArgs, USAGE } from "./args.js";
export type { CliOptions, ParsedCommand } from "./args.js";
export { decodeWav, encodeWav } from "./wav.js";
