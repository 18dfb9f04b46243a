import { Command } from "commander";

import { registerDevelopCommand } from "./cli/develop.js";

export { runDevelop } from "./develop/pipeline.js";
export type { DevelopContext, DevelopResult } from "./develop/pipeline.js";
export type { DevelopPorts } from "./develop/ports.js";

export function buildCli(): Command {
  const program = new Command();

  program
    .name("qhub-develop")
    .description("Bootstrap a local minikube QHub development environment")
    .version("0.1.0");

  registerDevelopCommand(program);
  return program;
}

export async function main(argv: string[]): Promise<void> {
  await buildCli().parseAsync(argv);
}
