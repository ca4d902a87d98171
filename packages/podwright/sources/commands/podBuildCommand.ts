import { resolve } from "node:path";
import Docker from "dockerode";
import { getLogger } from "../log.js";
import { podProvision } from "../podProvision.js";
import type { PodBuildCliOptions, PodImageHandle } from "../types.js";
import { podProjectLabel, podProjectLoad } from "./podProjectLoad.js";

const logger = getLogger("command.build");

export type PodBuildCommandDependencies = {
    dockerCreate?: () => Docker;
    print?: (line: string) => void;
    cwd?: string;
};

/**
 * Builds the pod image for the project next to the recipe file.
 * Expects: a reachable Docker daemon and a build driver that passes --tag.
 */
export async function podBuildCommand(
    options: PodBuildCliOptions,
    dependencies: PodBuildCommandDependencies = {}
): Promise<PodImageHandle> {
    const cwd = dependencies.cwd ?? process.cwd();
    const print = dependencies.print ?? ((line: string) => console.log(line));
    const project = await podProjectLoad(options.recipe, options, cwd);

    if (options.tag === undefined || options.tag.length === 0) {
        logger.warn("tag: No --tag given; the image identity variable will be empty");
    }

    const docker = dependencies.dockerCreate ? dependencies.dockerCreate() : new Docker();
    print(`Building pod image for ${podProjectLabel(project)}`);

    const handle = await podProvision(docker, {
        recipe: project.recipe,
        contextDirectory: project.contextDirectory,
        manifestPath: project.paths.manifest,
        makefilePath: project.paths.makefile,
        codeTreePath: project.paths.codeTree,
        policyPath: project.paths.policy,
        versionTag: options.tag,
        useCache: options.cache,
        historyPath: options.history ? resolve(cwd, options.history) : undefined,
        onOutput: (line) => logger.debug({ line }, "docker: Build output")
    });

    for (const layer of handle.layers) {
        print(`${layer.stage.padEnd(12)} ${layer.hash} ${layer.reused ? "cached" : "built"}`);
    }
    print(`Build complete. Image: ${handle.reference} (${handle.imageId})`);
    return handle;
}
