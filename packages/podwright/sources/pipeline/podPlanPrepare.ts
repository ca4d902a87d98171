import { podInputDigest } from "../hash/podInputDigest.js";
import { getLogger } from "../log.js";
import { podManifestRead } from "../manifest/podManifestRead.js";
import { podInputsEnsure } from "../paths/podInputsEnsure.js";
import { type PodInputPaths, podInputsResolve } from "../paths/podInputsResolve.js";
import type { PodInputs, PodManifest, PodPipelinePlan, PodRecipe } from "../types.js";
import { podPipelinePlan } from "./podPipelinePlan.js";

const logger = getLogger("pipeline.prepare");

export interface PodPlanPrepared {
    inputs: PodInputs;
    manifest: PodManifest;
    plan: PodPipelinePlan;
}

/**
 * Resolves and checks the project inputs, validates the manifest and plans every stage.
 * Expects: nothing is built here, so a bad input fails before the first layer.
 */
export async function podPlanPrepare(
    recipe: PodRecipe,
    contextDirectory: string,
    paths: PodInputPaths,
    versionTag?: string
): Promise<PodPlanPrepared> {
    const inputs = podInputsResolve(contextDirectory, paths);
    await podInputsEnsure(inputs);

    const manifest = await podManifestRead(inputs.manifest.hostPath, { requirePinned: recipe.requirePinned });
    logger.debug(
        { manifest: manifest.path, requirements: manifest.requirements.length },
        "manifest: Dependency manifest validated"
    );

    const plan = podPipelinePlan({
        recipe,
        inputs,
        digests: {
            manifest: await podInputDigest(inputs.manifest),
            makefile: await podInputDigest(inputs.makefile),
            codeTree: await podInputDigest(inputs.codeTree),
            policy: await podInputDigest(inputs.policy)
        },
        versionTag
    });

    return { inputs, manifest, plan };
}
