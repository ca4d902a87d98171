import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import type { PodStageName } from "../types.js";

export type PodBuildHistoryEntry =
    | { type: "pipeline.start"; stages: number; versionTag: string | null }
    | { type: "stage.reuse"; stage: PodStageName; hash: string; imageId: string }
    | { type: "stage.start"; stage: PodStageName; hash: string }
    | { type: "stage.complete"; stage: PodStageName; hash: string; imageId: string }
    | { type: "stage.failed"; stage: PodStageName; hash: string; error: unknown }
    | { type: "pipeline.complete"; reference: string; imageId: string };

/**
 * Appends one structured history record to a JSON lines file.
 * Expects: historyPath points to a writable file location.
 */
export async function podBuildHistoryAppend(historyPath: string, entry: PodBuildHistoryEntry): Promise<void> {
    const record = {
        timestamp: Date.now(),
        ...entry
    };

    await mkdir(dirname(historyPath), { recursive: true });
    await appendFile(historyPath, `${podJsonSerializeSafe(record)}\n`, "utf-8");
}

function podJsonSerializeSafe(value: unknown): string {
    try {
        return JSON.stringify(value, (_, fieldValue: unknown) => {
            if (fieldValue instanceof Error) {
                return { name: fieldValue.name, message: fieldValue.message };
            }
            return fieldValue;
        });
    } catch (error) {
        const message = error instanceof Error ? error.message : "failed to serialize history";
        return JSON.stringify({ timestamp: Date.now(), type: "history.serialize_error", message });
    }
}
