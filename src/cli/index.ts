#!/usr/bin/env node

import { getErrorMessage } from "@/common/utils/errors";
import { log } from "@/node/services/log";
import { LlmService } from "@/node/services/llm/llmService";
import { parseCliArgs, type CliArgs } from "./args";
import {
  configCommand,
  consoleOutput,
  generateCommand,
  importCommand,
  modelsCommand,
  selectCommand,
  startCommand,
  statusCommand,
  stopCommand,
  whichCommand,
  type ExitCode,
} from "./commands";

const USAGE = [
  "Usage:",
  "  llamakeeper status",
  "  llamakeeper start [--model <path>]",
  "  llamakeeper stop",
  "  llamakeeper models [--dir <path>]",
  "  llamakeeper select <model-path>",
  "  llamakeeper import <file.gguf>",
  "  llamakeeper generate <prompt> [--no-stream] [--max-tokens <n>] [--temperature <t>]",
  "  llamakeeper which",
  "  llamakeeper config [get [key] | set <key> <value>]",
  "",
  "Options:",
  "  -v, --verbose   debug logging",
].join("\n");

// Ctrl-C cancels an import or generation in flight
const interrupt = new AbortController();
process.once("SIGINT", () => interrupt.abort());

async function run(): Promise<ExitCode> {
  let parsed: CliArgs;
  try {
    parsed = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    console.error(`Error: ${getErrorMessage(err)}`);
    console.log(USAGE);
    return 1;
  }
  const { positionals, values } = parsed;
  if (values.verbose) {
    log.setLevel("debug");
  }

  const [command, ...rest] = positionals;
  if (values.help || !command) {
    console.log(USAGE);
    return values.help ? 0 : 1;
  }

  const service = new LlmService();
  const io = consoleOutput;

  switch (command) {
    case "status":
      return statusCommand(service, io);
    case "start":
      return startCommand(service, io, values.model);
    case "stop":
      return stopCommand(service, io);
    case "models":
      return modelsCommand(service, io, values.dir);
    case "select": {
      if (!rest[0]) {
        console.error("Error: model path required");
        console.log("Usage: llamakeeper select <model-path>");
        return 1;
      }
      return selectCommand(service, io, rest[0]);
    }
    case "import": {
      if (!rest[0]) {
        console.error("Error: file path required");
        console.log("Usage: llamakeeper import <file.gguf>");
        return 1;
      }
      return importCommand(service, io, rest[0], interrupt.signal);
    }
    case "generate": {
      const prompt = rest.join(" ");
      if (!prompt) {
        console.error("Error: prompt required");
        console.log('Usage: llamakeeper generate "<prompt>"');
        return 1;
      }
      return generateCommand(service, io, prompt, {
        stream: !values["no-stream"],
        maxTokens: values["max-tokens"],
        temperature: values.temperature,
        signal: interrupt.signal,
      });
    }
    case "which":
      return whichCommand(service, io);
    case "config":
      return configCommand(service, io, rest);
    default:
      console.error(`Unknown command: ${command}`);
      console.log(USAGE);
      return 1;
  }
}

run().then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error(getErrorMessage(err));
    process.exit(1);
  }
);
