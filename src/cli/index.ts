export { parseCliCommand, SUPPORTED_CLI_COMMANDS } from "./commands";
export type { CliCommand, ParsedCliCommand } from "./commands";
export { CliCommandError, CliFlagError } from "./errors";
export { INSECURE_WARNING, OUTPUT_FORMATS, parseCliFlags } from "./flags";
export type { ParseCliFlagsOptions } from "./flags";
export { renderCliHelp } from "./help";
export { renderBatchReport } from "./output";
export { redactCliParameters } from "./redaction";
export { RUN_BANNER, runCli } from "./run";
export type { CliIo, CliRuntime } from "./run";
export { readPackageVersion } from "./version";
