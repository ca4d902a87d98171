import { rm } from "node:fs/promises";
import type Docker from "dockerode";
import { POD_LAYER_HASH_LABEL, POD_LAYER_REPOSITORY, POD_LAYER_STAGE_LABEL } from "../constants.js";
import { dockerImageBuild } from "../docker/dockerImageBuild.js";
import { dockerImageInspectIfExists } from "../docker/dockerImageInspectIfExists.js";
import { podLayerDockerfileRender } from "../dockerfile/podDockerfileRender.js";
import { podContextStage } from "../fs/podContextStage.js";
import { type PodBuildHistoryEntry, podBuildHistoryAppend } from "../history/podBuildHistoryAppend.js";
import { getLogger } from "../log.js";
import type { PodLayer, PodLayerRef, PodPipelinePlan } from "../types.js";
import { PodStageError } from "./podStageError.js";

const logger = getLogger("pipeline.run");

export interface PodPipelineRunOptions {
    /** Reuse layer images already built for the same hash. */
    useCache: boolean;
    historyPath?: string;
    onOutput?: (line: string) => void;
}

/**
 * Realises every planned layer as a local image, strictly in order.
 * Each layer is tagged by its hash, so a rerun after a failure starts at the failed stage.
 * Expects: the first failure aborts the run with a PodStageError and later stages never start.
 */
export async function podPipelineRun(
    docker: Docker,
    plan: PodPipelinePlan,
    options: PodPipelineRunOptions
): Promise<PodLayerRef[]> {
    const historyRecord = async (entry: PodBuildHistoryEntry): Promise<void> => {
        if (options.historyPath) {
            await podBuildHistoryAppend(options.historyPath, entry);
        }
    };

    const refs: PodLayerRef[] = [];
    let parentReference: string | null = null;

    for (const layer of plan) {
        const reference = podLayerReferenceBuild(layer);
        try {
            refs.push(await podLayerRealise(docker, layer, reference, parentReference, options, historyRecord));
        } catch (error) {
            const stageError = error instanceof PodStageError ? error : new PodStageError(layer.stage, error);
            try {
                await historyRecord({ type: "stage.failed", stage: layer.stage, hash: layer.hash, error });
            } catch (historyError) {
                logger.warn({ stage: layer.stage, error: historyError }, "history: Failed to record stage failure");
            }
            throw stageError;
        }
        parentReference = reference;
    }

    return refs;
}

export function podLayerReferenceBuild(layer: PodLayer): string {
    return `${POD_LAYER_REPOSITORY}:${layer.hash}`;
}

async function podLayerRealise(
    docker: Docker,
    layer: PodLayer,
    reference: string,
    parentReference: string | null,
    options: PodPipelineRunOptions,
    historyRecord: (entry: PodBuildHistoryEntry) => Promise<void>
): Promise<PodLayerRef> {
    if (options.useCache) {
        const cached = await dockerImageInspectIfExists(docker, reference);
        if (cached) {
            logger.info({ stage: layer.stage, hash: layer.hash }, "reuse: Layer already built");
            await historyRecord({ type: "stage.reuse", stage: layer.stage, hash: layer.hash, imageId: cached.Id });
            return { stage: layer.stage, hash: layer.hash, reference, imageId: cached.Id, reused: true };
        }
    }

    logger.info({ stage: layer.stage, hash: layer.hash }, "build: Building layer");
    await historyRecord({ type: "stage.start", stage: layer.stage, hash: layer.hash });

    const staged = await podContextStage(layer, podLayerDockerfileRender(layer, parentReference));
    try {
        await dockerImageBuild(docker, {
            contextDirectory: staged.directory,
            sources: staged.sources,
            dockerfile: staged.dockerfile,
            tag: reference,
            buildArgs: { ...layer.args },
            labels: {
                [POD_LAYER_HASH_LABEL]: layer.hash,
                [POD_LAYER_STAGE_LABEL]: layer.stage
            },
            onOutput: options.onOutput
        });
    } finally {
        await rm(staged.directory, { recursive: true, force: true });
    }

    const built = await dockerImageInspectIfExists(docker, reference);
    if (!built) {
        throw new Error(`image ${reference} is missing after build`);
    }

    await historyRecord({ type: "stage.complete", stage: layer.stage, hash: layer.hash, imageId: built.Id });
    return { stage: layer.stage, hash: layer.hash, reference, imageId: built.Id, reused: false };
}
