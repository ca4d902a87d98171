import Docker from "dockerode";
import { POD_DEFAULT_BASE_PATH } from "../constants.js";
import { dockerImageInspectIfExists } from "../docker/dockerImageInspectIfExists.js";
import { getLogger } from "../log.js";
import { podImageEnvironmentParse } from "../podProvision.js";
import { podEnvironmentResolve } from "../pipeline/podEnvironmentResolve.js";
import { podPlanPrepare } from "../pipeline/podPlanPrepare.js";
import type { PodPlanCliOptions } from "../types.js";
import { podProjectLoad } from "./podProjectLoad.js";

const logger = getLogger("command.plan");

export type PodPlanCommandDependencies = {
    dockerCreate?: () => Docker;
    print?: (line: string) => void;
    cwd?: string;
};

/**
 * Prints the planned stages with their layer hashes and the environment the image will carry.
 * Expects: --inspect-base needs a Docker daemon that already has the base image.
 */
export async function podPlanCommand(
    options: PodPlanCliOptions,
    dependencies: PodPlanCommandDependencies = {}
): Promise<void> {
    const cwd = dependencies.cwd ?? process.cwd();
    const print = dependencies.print ?? ((line: string) => console.log(line));
    const project = await podProjectLoad(options.recipe, {}, cwd);
    const { plan, manifest } = await podPlanPrepare(project.recipe, project.contextDirectory, project.paths, options.tag);

    let baseEnv: Record<string, string> = { PATH: POD_DEFAULT_BASE_PATH };
    if (options.inspectBase) {
        const docker = dependencies.dockerCreate ? dependencies.dockerCreate() : new Docker();
        const base = await dockerImageInspectIfExists(docker, project.recipe.baseImage);
        if (base) {
            baseEnv = podImageEnvironmentParse(base.Config?.Env ?? []);
        } else {
            logger.warn({ image: project.recipe.baseImage }, "base: Base image not present locally");
        }
    }

    print(`Base image: ${project.recipe.baseImage}`);
    print(`Requirements: ${manifest.requirements.length}`);
    for (const layer of plan) {
        print(`${layer.stage.padEnd(12)} ${layer.hash}`);
    }
    print("Environment:");
    const env = podEnvironmentResolve(plan, baseEnv);
    for (const name of Object.keys(env).sort()) {
        print(`  ${name}=${env[name]}`);
    }
}
