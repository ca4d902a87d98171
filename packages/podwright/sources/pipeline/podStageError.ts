import type { PodStageName } from "../types.js";

/**
 * Error raised when a pipeline stage cannot be realised.
 * Expects: cause is the underlying docker, filesystem or validation failure.
 */
export class PodStageError extends Error {
    readonly stage: PodStageName;

    constructor(stage: PodStageName, cause: unknown) {
        const details = cause instanceof Error && cause.message ? cause.message : "unknown error";
        super(`stage ${stage} failed: ${details}`, { cause });
        this.name = "PodStageError";
        this.stage = stage;
    }
}
