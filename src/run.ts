import { readFileSync } from "fs";
import * as readline from "node:readline";
import { formatLexicalError, formatParseError, formatToken } from "./errors";
import { scan } from "./lexer";
import { Parser } from "./parser";
import { printExpr } from "./printer";
import { andThen, map } from "./result";
import type { Token } from "./types";

export type RunMode = "ast" | "tokens";

export type RunOptions = {
  readonly mode: RunMode;
};

export type OutputLine = {
  readonly stream: "stdout" | "stderr";
  readonly text: string;
};

/** What one input unit printed, in order. */
export type RunOutcome = {
  readonly lines: OutputLine[];
  readonly hadError: boolean;
};

export type CommandLine = {
  readonly options: RunOptions;
  readonly script: string | undefined;
};

export const usage = "Usage: lox-expr [--tokens] [script]";

/** Returns null when the arguments don't fit {@link usage}. */
export function parseArgs(args: readonly string[]): CommandLine | null {
  let mode: RunMode = "ast";
  const scripts: string[] = [];
  for (const arg of args) {
    if (arg === "--tokens") {
      mode = "tokens";
    } else if (arg.startsWith("-")) {
      return null;
    } else {
      scripts.push(arg);
    }
  }
  if (scripts.length > 1) {
    return null;
  }
  return { options: { mode: mode }, script: scripts[0] };
}

/**
 * Runs one input unit. Bad input shows up as `stderr` lines; nothing here
 * throws or prints.
 */
export function run(source: string, options: RunOptions): RunOutcome {
  const results = scan(source);

  if (options.mode === "tokens") {
    const lines = results.map((result) =>
      result.type === "token"
        ? stdout(formatToken(result.token))
        : stderr(formatLexicalError(result.error))
    );
    return outcome(lines);
  }

  const tokens: Token[] = [];
  const errors: OutputLine[] = [];
  for (const result of results) {
    if (result.type === "token") {
      tokens.push(result.token);
    } else {
      errors.push(stderr(formatLexicalError(result.error)));
    }
  }
  if (errors.length > 0) {
    return outcome(errors);
  }

  const parser = new Parser(tokens);
  const result = andThen(parser.parse(), (expr) =>
    map(parser.expectEnd(), () => expr)
  );
  if (result.type === "err") {
    return outcome([stderr(formatParseError(result.error))]);
  }
  return outcome([stdout(printExpr(result.value))]);
}

function stdout(text: string): OutputLine {
  return { stream: "stdout", text: text };
}

function stderr(text: string): OutputLine {
  return { stream: "stderr", text: text };
}

function outcome(lines: OutputLine[]): RunOutcome {
  return {
    lines: lines,
    hadError: lines.some((line) => line.stream === "stderr"),
  };
}

export function runFile(path: string, options: RunOptions): void {
  let input: string;
  try {
    input = readFileSync(path, "utf-8");
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    console.error("Could not read file %s: %s", path, reason);
    process.exit(74);
  }

  if (report(run(input, options))) {
    process.exit(65);
  }
}

export function runPrompt(options: RunOptions): void {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: "> ",
  });
  rl.prompt();
  rl.on("line", (line: string) => {
    if (!line) {
      rl.close();
      return;
    }
    report(run(line, options));
    rl.prompt();
  });
}

// Returns whether anything went wrong.
function report(outcome: RunOutcome): boolean {
  for (const line of outcome.lines) {
    if (line.stream === "stdout") {
      console.log(line.text);
    } else {
      console.error(line.text);
    }
  }
  return outcome.hadError;
}
