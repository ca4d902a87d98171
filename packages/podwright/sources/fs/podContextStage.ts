import { cp, mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { POD_CONTEXT_DOCKERFILE } from "../constants.js";
import type { PodLayer } from "../types.js";

export interface PodContextStaged {
    directory: string;
    dockerfile: string;
    sources: string[];
}

/**
 * Stages a build context holding only the layer's declared inputs and its Dockerfile.
 * Files are copied byte for byte; the caller removes the directory after the build.
 * A failed copy removes the partly staged directory.
 */
export async function podContextStage(
    layer: PodLayer,
    dockerfileText: string,
    tempRoot: string = tmpdir()
): Promise<PodContextStaged> {
    const directory = await mkdtemp(join(tempRoot, `podwright-${layer.stage}-`));

    try {
        await writeFile(join(directory, POD_CONTEXT_DOCKERFILE), dockerfileText, "utf-8");
        for (const input of layer.inputs) {
            const target = join(directory, ...input.contextPath.split("/"));
            await mkdir(dirname(target), { recursive: true });
            await cp(input.hostPath, target, { recursive: true, force: true, verbatimSymlinks: true });
        }
    } catch (error) {
        await rm(directory, { recursive: true, force: true });
        throw error;
    }

    return {
        directory,
        dockerfile: POD_CONTEXT_DOCKERFILE,
        sources: [POD_CONTEXT_DOCKERFILE, ...podContextSourcesPrune(layer.inputs.map((input) => input.contextPath))]
    };
}

/**
 * Drops entries already covered by a parent directory entry, so the context archive has no duplicates.
 */
export function podContextSourcesPrune(paths: string[]): string[] {
    const unique = [...new Set(paths)].sort();
    return unique.filter((path) => !unique.some((other) => other !== path && path.startsWith(`${other}/`)));
}
