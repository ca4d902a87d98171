export { podRecipeRead } from "./config/podRecipeRead.js";
export { podRecipeResolve } from "./config/podRecipeResolve.js";
export { podDockerfileRender, podLayerDockerfileRender } from "./dockerfile/podDockerfileRender.js";
export { podInputDigest } from "./hash/podInputDigest.js";
export { podLayerHashBuild } from "./hash/podLayerHashBuild.js";
export { type PodBuildHistoryEntry, podBuildHistoryAppend } from "./history/podBuildHistoryAppend.js";
export { getLogger, initLogging, resetLogging } from "./log.js";
export { podManifestParse } from "./manifest/podManifestParse.js";
export { podManifestRead } from "./manifest/podManifestRead.js";
export { podInputsEnsure } from "./paths/podInputsEnsure.js";
export { type PodInputPaths, podInputsResolve } from "./paths/podInputsResolve.js";
export { podEnvironmentExpand, podEnvironmentResolve } from "./pipeline/podEnvironmentResolve.js";
export { podPipelinePlan } from "./pipeline/podPipelinePlan.js";
export { podLayerReferenceBuild, podPipelineRun, type PodPipelineRunOptions } from "./pipeline/podPipelineRun.js";
export { podPlanPrepare } from "./pipeline/podPlanPrepare.js";
export { PodStageError } from "./pipeline/podStageError.js";
export { podImageEnvironmentParse, podProvision, type PodProvisionInput } from "./podProvision.js";
export * from "./types.js";
