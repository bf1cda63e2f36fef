import { Command } from "commander";

import { initProjectConfig } from "../core/config-discovery.js";

export function registerInitCommand(program: Command): void {
  program
    .command("init")
    .description("Create .autodeploy/config.yaml in the current directory")
    .option("--force", "Overwrite an existing config", false)
    .action((opts: { force?: boolean }) => {
      initCommand(opts);
    });
}

export function initCommand(
  opts: { force?: boolean; cwd?: string },
  print: (line: string) => void = (line) => console.log(line),
): void {
  const result = initProjectConfig({ cwd: opts.cwd ?? process.cwd(), force: opts.force });

  if (result.status === "created") {
    print(`Created AutoDeploy config at ${result.configPath}`);
    print(`Edit ${result.configPath} to list the repositories to merge.`);
    return;
  }

  if (result.status === "overwritten") {
    print(`Overwrote AutoDeploy config at ${result.configPath}`);
    return;
  }

  print(`Config already exists at ${result.configPath}`);
}
