import { CliCommandError } from "./errors";

const HELP_ALIASES = new Set(["help", "--help", "-h"]);

export const SUPPORTED_CLI_COMMANDS = ["check", "run", "help"] as const;

export type CliCommand = (typeof SUPPORTED_CLI_COMMANDS)[number];

export interface ParsedCliCommand {
  command: CliCommand;
  argv: string[];
}

function isSupportedCommand(value: string): value is CliCommand {
  return SUPPORTED_CLI_COMMANDS.some((candidate) => candidate === value);
}

export function parseCliCommand(argv: readonly string[]): ParsedCliCommand {
  if (argv.length === 0) {
    throw new CliCommandError(undefined, SUPPORTED_CLI_COMMANDS);
  }

  const [commandToken, ...rest] = argv;

  if (HELP_ALIASES.has(commandToken)) {
    return { command: "help", argv: rest };
  }

  if (!isSupportedCommand(commandToken)) {
    throw new CliCommandError(commandToken, SUPPORTED_CLI_COMMANDS);
  }

  return { command: commandToken, argv: rest };
}
