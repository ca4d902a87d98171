import { podLayerHashBuild } from "../hash/podLayerHashBuild.js";
import type { PodInstruction, PodLayer, PodLayerInput, PodStageName } from "../types.js";

/**
 * Creates an immutable layer plan and stamps it with its content hash.
 * Expects: parent is the predecessor layer, or null for the base layer.
 */
export function podLayerCreate<S extends PodStageName>(
    stage: S,
    parent: PodLayer | null,
    instructions: PodInstruction[],
    inputs: PodLayerInput[] = [],
    args: Record<string, string> = {}
): PodLayer<S> {
    const parentHash = parent?.hash ?? null;
    const hash = podLayerHashBuild({ stage, parentHash, instructions, inputs, args });

    return Object.freeze({
        stage,
        parentHash,
        instructions: Object.freeze([...instructions]),
        inputs: Object.freeze([...inputs]),
        args: Object.freeze({ ...args }),
        hash
    });
}
