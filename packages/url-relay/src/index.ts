#!/usr/bin/env node
import { Command } from "commander";
import { VERSION } from "./lib/version.js";
import { initContext } from "./lib/cli-context.js";
import { renderUnknownError } from "./lib/errors/renderer.js";
import { registerServeCommand } from "./modules/serve.js";
import { registerClientCommands } from "./modules/client.js";
import { registerTokenCommand } from "./modules/token.js";
import { registerConfigCommands } from "./modules/config-cmd.js";

export function buildProgram(): Command {
  const program = new Command()
    .name("url-relay")
    .description("Open URLs from a guest VM's browser in the host's browser")
    .version(VERSION)
    .option("--json", "Output machine-readable JSON")
    .option("-q, --quiet", "Suppress spinners");

  registerServeCommand(program);
  registerClientCommands(program);
  registerTokenCommand(program);
  registerConfigCommands(program);

  return program;
}

export async function main(argv = process.argv): Promise<void> {
  initContext(argv);

  try {
    await buildProgram().parseAsync(argv);
  } catch (error) {
    renderUnknownError(error);
    process.exitCode = 1;
  }
}

void main();
