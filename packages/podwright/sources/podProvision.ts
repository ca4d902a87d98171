import type Docker from "dockerode";
import { dockerImageInspectIfExists } from "./docker/dockerImageInspectIfExists.js";
import { podBuildHistoryAppend } from "./history/podBuildHistoryAppend.js";
import { getLogger } from "./log.js";
import { podPipelineRun } from "./pipeline/podPipelineRun.js";
import { podPlanPrepare } from "./pipeline/podPlanPrepare.js";
import type { PodImageHandle, PodRecipe } from "./types.js";

const logger = getLogger("provision");

export interface PodProvisionInput {
    recipe: PodRecipe;
    /** Directory the input paths are resolved against and copied from. */
    contextDirectory: string;
    manifestPath: string;
    makefilePath: string;
    codeTreePath: string;
    policyPath: string;
    /** Build identifier from the build driver; never defaulted. */
    versionTag?: string;
    useCache?: boolean;
    historyPath?: string;
    onOutput?: (line: string) => void;
}

/**
 * Provisions a pod image: plans the seven stages, realises them in order and tags the result.
 * Expects: a failed stage leaves the repository tag untouched.
 */
export async function podProvision(docker: Docker, input: PodProvisionInput): Promise<PodImageHandle> {
    const { plan } = await podPlanPrepare(
        input.recipe,
        input.contextDirectory,
        {
            manifest: input.manifestPath,
            makefile: input.makefilePath,
            codeTree: input.codeTreePath,
            policy: input.policyPath
        },
        input.versionTag
    );

    if (input.historyPath) {
        await podBuildHistoryAppend(input.historyPath, {
            type: "pipeline.start",
            stages: plan.length,
            versionTag: input.versionTag ?? null
        });
    }

    const layers = await podPipelineRun(docker, plan, {
        useCache: input.useCache ?? true,
        historyPath: input.historyPath,
        onOutput: input.onOutput
    });

    const stamp = layers[layers.length - 1];
    if (!stamp) {
        throw new Error("pipeline produced no layers");
    }

    const imageTag = input.versionTag && input.versionTag.length > 0 ? input.versionTag : stamp.hash;
    const reference = `${input.recipe.repository}:${imageTag}`;
    await docker.getImage(stamp.reference).tag({ repo: input.recipe.repository, tag: imageTag });

    const details = await dockerImageInspectIfExists(docker, reference);
    if (!details) {
        throw new Error(`image ${reference} is missing after tagging`);
    }

    if (input.historyPath) {
        await podBuildHistoryAppend(input.historyPath, { type: "pipeline.complete", reference, imageId: details.Id });
    }
    logger.info({ reference, imageId: details.Id }, "complete: Pod image provisioned");

    return {
        reference,
        imageId: details.Id,
        versionTag: input.versionTag,
        layers,
        environment: podImageEnvironmentParse(details.Config?.Env ?? [])
    };
}

export function podImageEnvironmentParse(entries: readonly string[]): Record<string, string> {
    const env: Record<string, string> = {};
    for (const entry of entries) {
        const separator = entry.indexOf("=");
        if (separator <= 0) {
            continue;
        }
        env[entry.slice(0, separator)] = entry.slice(separator + 1);
    }
    return env;
}
