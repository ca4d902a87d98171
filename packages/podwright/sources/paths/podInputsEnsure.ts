import { stat } from "node:fs/promises";
import type { PodInput, PodInputs } from "../types.js";

/**
 * Validates that every pipeline input exists with the expected kind.
 * Expects: inputs were produced by podInputsResolve.
 */
export async function podInputsEnsure(inputs: PodInputs): Promise<void> {
    await podInputEnsure(inputs.manifest, "dependency manifest");
    await podInputEnsure(inputs.makefile, "makefile");
    await podInputEnsure(inputs.codeTree, "code tree");
    await podInputEnsure(inputs.policy, "sandbox policy");
}

async function podInputEnsure(input: PodInput, label: string): Promise<void> {
    let inputStat: Awaited<ReturnType<typeof stat>>;
    try {
        inputStat = await stat(input.hostPath);
    } catch {
        throw new Error(`${label} not found at ${input.hostPath}`);
    }

    const matches = input.kind === "directory" ? inputStat.isDirectory() : inputStat.isFile();
    if (!matches) {
        throw new Error(`${label} is not a ${input.kind}: ${input.hostPath}`);
    }
}
