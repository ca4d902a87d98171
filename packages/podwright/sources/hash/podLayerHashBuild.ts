import { createHash } from "node:crypto";
import { POD_LAYER_HASH_LENGTH } from "../constants.js";
import type { PodInstruction, PodLayerInput, PodStageName } from "../types.js";

export interface PodLayerHashInput {
    stage: PodStageName;
    parentHash: string | null;
    instructions: readonly PodInstruction[];
    inputs: readonly PodLayerInput[];
    args: Readonly<Record<string, string>>;
}

/**
 * Builds the content address of a layer from its parent, instructions, input digests and bound arguments.
 * Host paths are left out so the same checkout in another directory hashes the same.
 */
export function podLayerHashBuild(layer: PodLayerHashInput): string {
    const canonical = JSON.stringify({
        stage: layer.stage,
        parent: layer.parentHash,
        instructions: layer.instructions.map(podInstructionCanonical),
        inputs: layer.inputs.map((input) => [input.contextPath, input.digest]),
        args: Object.keys(layer.args)
            .sort()
            .map((name) => [name, layer.args[name]])
    });

    return createHash("sha256").update(canonical).digest("hex").slice(0, POD_LAYER_HASH_LENGTH);
}

function podInstructionCanonical(instruction: PodInstruction): string[] {
    switch (instruction.kind) {
        case "from":
            return [instruction.kind, instruction.image];
        case "workdir":
            return [instruction.kind, instruction.path];
        case "env":
            return [instruction.kind, instruction.name, instruction.value];
        case "arg":
            return [instruction.kind, instruction.name];
        case "run":
            return [instruction.kind, instruction.command];
        case "copy":
            return [instruction.kind, instruction.source, instruction.destination];
    }
}
