#!/usr/bin/env node
import { parseArgs, runFile, runPrompt, usage } from "./run";

const commandLine = parseArgs(process.argv.slice(2));
if (commandLine === null) {
  console.log(usage);
  process.exit(64);
} else if (commandLine.script !== undefined) {
  runFile(commandLine.script, commandLine.options);
} else {
  runPrompt(commandLine.options);
}
