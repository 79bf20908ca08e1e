import { UsageError } from "../errors";

export type CliFlagProblem =
  | { kind: "missing-value" }
  | { kind: "not-an-integer" }
  | { kind: "not-positive" }
  | { kind: "not-one-of"; choices: readonly string[] }
  | { kind: "unknown-flag" }
  | { kind: "unexpected-argument" };

function describeFlagProblem(token: string, problem: CliFlagProblem): string {
  switch (problem.kind) {
    case "missing-value":
      return `Flag ${token} requires a value`;
    case "not-an-integer":
      return `Flag ${token} must be a non-negative integer`;
    case "not-positive":
      return `Flag ${token} must be greater than 0`;
    case "not-one-of":
      return `${token} must be one of: ${problem.choices.join(", ")}`;
    case "unknown-flag":
      return `Unknown flag: ${token}`;
    case "unexpected-argument":
      return `Unexpected argument: ${token}`;
    default: {
      const exhaustiveCheck: never = problem;
      return exhaustiveCheck;
    }
  }
}

/** A rejected command-line token; `token` is the flag or stray argument. */
export class CliFlagError extends UsageError {
  readonly token: string;
  readonly problem: CliFlagProblem;

  constructor(token: string, problem: CliFlagProblem) {
    super(describeFlagProblem(token, problem));
    this.name = "CliFlagError";
    this.token = token;
    this.problem = problem;
  }
}

/** The first argument is missing or names no command; `command` is undefined when missing. */
export class CliCommandError extends UsageError {
  readonly command: string | undefined;

  constructor(command: string | undefined, expected: readonly string[]) {
    const choices = `Expected one of: ${expected.join(", ")}`;
    super(
      command === undefined
        ? `A command is required. ${choices}`
        : `Unknown command: ${command}. ${choices}`,
    );
    this.name = "CliCommandError";
    this.command = command;
  }
}
