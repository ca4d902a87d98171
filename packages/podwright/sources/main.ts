#!/usr/bin/env node
import { readFileSync } from "node:fs";
import { Command } from "commander";
import { podBuildCommand } from "./commands/podBuildCommand.js";
import { podDockerfileCommand } from "./commands/podDockerfileCommand.js";
import { podPlanCommand } from "./commands/podPlanCommand.js";
import { POD_RECIPE_FILE } from "./constants.js";
import { initLogging } from "./log.js";
import type { PodBuildCliOptions, PodDockerfileCliOptions, PodPlanCliOptions } from "./types.js";

const pkg = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8")) as { version: string };

initLogging();

const program = new Command();

program.name("podwright").version(pkg.version);

program
    .command("build")
    .description("Build the pod image stage by stage on the local Docker daemon")
    .option("-r, --recipe <path>", "Recipe file path", POD_RECIPE_FILE)
    .option("-t, --tag <tag>", "Version tag from the build driver, exposed inside the image")
    .option("--manifest <path>", "Override the dependency manifest path")
    .option("--code <path>", "Override the code tree path")
    .option("--policy <path>", "Override the sandbox policy path")
    .option("--repository <name>", "Override the image repository")
    .option("--history <path>", "Append build history records to this JSON lines file")
    .option("--no-cache", "Rebuild every layer even when a matching layer image exists")
    .action(async (options: PodBuildCliOptions) => {
        await podBuildCommand(options);
    });

program
    .command("dockerfile")
    .description("Render the pipeline as a single Dockerfile")
    .option("-r, --recipe <path>", "Recipe file path", POD_RECIPE_FILE)
    .option("-o, --out <path>", "Write the Dockerfile to this path instead of stdout")
    .action(async (options: PodDockerfileCliOptions) => {
        await podDockerfileCommand(options);
    });

program
    .command("plan")
    .description("Print the planned stages, their layer hashes and the resulting environment")
    .option("-r, --recipe <path>", "Recipe file path", POD_RECIPE_FILE)
    .option("-t, --tag <tag>", "Version tag to plan with")
    .option("--inspect-base", "Read the base environment from the local base image")
    .action(async (options: PodPlanCliOptions) => {
        await podPlanCommand(options);
    });

if (process.argv.length <= 2) {
    program.outputHelp();
    process.exit(0);
}

try {
    await program.parseAsync(process.argv);
} catch (error) {
    const details = error instanceof Error && error.message ? error.message : "unknown error";
    console.error(`podwright failed: ${details}`);
    process.exit(1);
}
