import { posix } from "node:path";
import { POD_MAKEFILE_TARGET } from "../constants.js";
import type { PodLayer, PodStageContext } from "../types.js";
import { podLayerCreate } from "./podLayerCreate.js";

export function podStageBuildfileBuild(
    dependencies: PodLayer<"dependencies">,
    context: PodStageContext
): PodLayer<"buildfile"> {
    const { makefile } = context.inputs;

    return podLayerCreate(
        "buildfile",
        dependencies,
        [{ kind: "copy", source: makefile.contextPath, destination: posix.join(context.recipe.workdir, POD_MAKEFILE_TARGET) }],
        [{ contextPath: makefile.contextPath, hostPath: makefile.hostPath, digest: context.digests.makefile }]
    );
}
