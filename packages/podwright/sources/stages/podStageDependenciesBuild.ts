import { posix } from "node:path";
import { POD_MANIFEST_TARGET } from "../constants.js";
import type { PodLayer, PodStageContext } from "../types.js";
import { podLayerCreate } from "./podLayerCreate.js";
import { podShellQuote } from "./podShellQuote.js";

/**
 * Installs the pinned dependency manifest into the isolated environment.
 * Expects: the venv layer already put the environment's pip first on PATH.
 */
export function podStageDependenciesBuild(venv: PodLayer<"venv">, context: PodStageContext): PodLayer<"dependencies"> {
    const { manifest } = context.inputs;
    const destination = posix.join(context.recipe.workdir, POD_MANIFEST_TARGET);

    return podLayerCreate(
        "dependencies",
        venv,
        [
            { kind: "copy", source: manifest.contextPath, destination },
            { kind: "run", command: `pip install -r ${podShellQuote(destination)}` }
        ],
        [{ contextPath: manifest.contextPath, hostPath: manifest.hostPath, digest: context.digests.manifest }]
    );
}
