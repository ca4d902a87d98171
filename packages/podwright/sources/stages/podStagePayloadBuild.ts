import { posix } from "node:path";
import { POD_MAKEFILE_TARGET, POD_MANIFEST_TARGET } from "../constants.js";
import type { PodLayer, PodStageContext } from "../types.js";
import { podLayerCreate } from "./podLayerCreate.js";

/**
 * Copies the sandbox policy file and the task code tree under the workdir, verbatim.
 * The workdir becomes PYTHONPATH so the copied code is importable as-is.
 */
export function podStagePayloadBuild(buildfile: PodLayer<"buildfile">, context: PodStageContext): PodLayer<"payload"> {
    const { recipe, inputs, digests } = context;
    const policyDestination = posix.join(recipe.workdir, posix.basename(inputs.policy.contextPath));
    const codeDestination = posix.join(recipe.workdir, recipe.codeDestination ?? posix.basename(inputs.codeTree.contextPath));

    if (policyDestination === codeDestination) {
        throw new Error(`policy file and code tree would both be copied to ${codeDestination}`);
    }
    const stagedTargets = [POD_MANIFEST_TARGET, POD_MAKEFILE_TARGET].map((name) => posix.join(recipe.workdir, name));
    for (const [label, destination] of [
        ["policy file", policyDestination],
        ["code tree", codeDestination]
    ] as const) {
        if (stagedTargets.includes(destination)) {
            throw new Error(`${label} would overwrite the staged ${destination}`);
        }
    }

    return podLayerCreate(
        "payload",
        buildfile,
        [
            { kind: "copy", source: inputs.policy.contextPath, destination: policyDestination },
            { kind: "copy", source: inputs.codeTree.contextPath, destination: codeDestination },
            { kind: "env", name: "PYTHONPATH", value: recipe.workdir }
        ],
        [
            { contextPath: inputs.policy.contextPath, hostPath: inputs.policy.hostPath, digest: digests.policy },
            { contextPath: inputs.codeTree.contextPath, hostPath: inputs.codeTree.hostPath, digest: digests.codeTree }
        ]
    );
}
