import { writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import { podDockerfileRender } from "../dockerfile/podDockerfileRender.js";
import { podPlanPrepare } from "../pipeline/podPlanPrepare.js";
import type { PodDockerfileCliOptions } from "../types.js";
import { podProjectLoad } from "./podProjectLoad.js";

export type PodDockerfileCommandDependencies = {
    print?: (text: string) => void;
    cwd?: string;
};

/**
 * Renders the whole pipeline as a single Dockerfile.
 * Writes to --out when given, otherwise prints it.
 */
export async function podDockerfileCommand(
    options: PodDockerfileCliOptions,
    dependencies: PodDockerfileCommandDependencies = {}
): Promise<string> {
    const cwd = dependencies.cwd ?? process.cwd();
    const project = await podProjectLoad(options.recipe, {}, cwd);
    const { plan } = await podPlanPrepare(project.recipe, project.contextDirectory, project.paths);
    const dockerfile = podDockerfileRender(plan);

    if (options.out) {
        await writeFile(resolve(cwd, options.out), dockerfile, "utf-8");
    } else {
        const print = dependencies.print ?? ((text: string) => process.stdout.write(text));
        print(dockerfile);
    }
    return dockerfile;
}
