#!/usr/bin/env node
import { Command } from "commander";
import { planCommand } from "./commands/plan.js";
import { runCommand } from "./commands/run.js";

const program = new Command();

program
    .name("instance-bootstrap")
    .description("Container entrypoint: SSH keys, workspace, provisioning, then the process supervisor")
    .version("0.1.0");

program
    .command("run", { isDefault: true })
    .description("Prepare the instance and hand off to the supervisor")
    .option("--config <file>", "YAML overrides file (defaults to $BOOTSTRAP_CONFIG)")
    .action(runCommand);

program
    .command("plan")
    .description("Print the startup steps without running them")
    .option("--config <file>", "YAML overrides file (defaults to $BOOTSTRAP_CONFIG)")
    .action(planCommand);

await program.parseAsync();
