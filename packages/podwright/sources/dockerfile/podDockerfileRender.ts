import type { PodLayer, PodPipelinePlan } from "../types.js";
import { podInstructionRender } from "./podInstructionRender.js";

const STAGE_TITLES: Record<PodLayer["stage"], string> = {
    base: "Base runtime",
    tools: "Global tools, installed before the isolated environment so their dependencies are not shadowed",
    venv: "Isolated environment",
    dependencies: "Python dependencies",
    buildfile: "Makefile targets used by in-container build steps",
    payload: "Sandbox policy and task code",
    stamp: "Version supplied by the build driver, used when registering tasks and workflows"
};

/**
 * Renders the whole pipeline as one Dockerfile rooted at the context directory.
 * Expects: plan comes from podPipelinePlan; the tag build argument is left for the caller to supply.
 */
export function podDockerfileRender(plan: PodPipelinePlan): string {
    const sections = plan
        .filter((layer) => layer.instructions.length > 0)
        .map((layer) => [`# ${STAGE_TITLES[layer.stage]}`, ...layer.instructions.map(podInstructionRender)].join("\n"));
    return `${sections.join("\n\n")}\n`;
}

/**
 * Renders the Dockerfile for building a single layer on top of its parent image.
 * Expects: parentReference is set for every layer except base.
 */
export function podLayerDockerfileRender(layer: PodLayer, parentReference: string | null): string {
    const lines = layer.instructions.map(podInstructionRender);
    if (layer.stage !== "base") {
        if (!parentReference) {
            throw new Error(`layer ${layer.stage} needs a parent image`);
        }
        lines.unshift(`FROM ${parentReference}`);
    }
    return `${lines.join("\n")}\n`;
}
