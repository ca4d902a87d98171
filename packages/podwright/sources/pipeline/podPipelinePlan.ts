import { podStageBaseBuild } from "../stages/podStageBaseBuild.js";
import { podStageBuildfileBuild } from "../stages/podStageBuildfileBuild.js";
import { podStageDependenciesBuild } from "../stages/podStageDependenciesBuild.js";
import { podStagePayloadBuild } from "../stages/podStagePayloadBuild.js";
import { podStageStampBuild } from "../stages/podStageStampBuild.js";
import { podStageToolsBuild } from "../stages/podStageToolsBuild.js";
import { podStageVenvBuild } from "../stages/podStageVenvBuild.js";
import type { PodPipelinePlan, PodStageContext } from "../types.js";

/**
 * Plans the seven pipeline layers in their only valid order.
 * Each stage builder accepts just its predecessor's layer type, so reordering does not type-check.
 */
export function podPipelinePlan(context: PodStageContext): PodPipelinePlan {
    const base = podStageBaseBuild(context);
    const tools = podStageToolsBuild(base, context);
    const venv = podStageVenvBuild(tools);
    const dependencies = podStageDependenciesBuild(venv, context);
    const buildfile = podStageBuildfileBuild(dependencies, context);
    const payload = podStagePayloadBuild(buildfile, context);
    const stamp = podStageStampBuild(payload, context);

    return [base, tools, venv, dependencies, buildfile, payload, stamp];
}
