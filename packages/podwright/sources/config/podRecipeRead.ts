import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import type { PodRecipe } from "../types.js";
import { podRecipeResolve } from "./podRecipeResolve.js";

/**
 * Reads and validates a podwright.yaml recipe file.
 * A missing file yields the default recipe when allowMissing is set.
 */
export async function podRecipeRead(recipePath: string, allowMissing = false): Promise<PodRecipe> {
    let rawText: string;
    try {
        rawText = await readFile(recipePath, "utf-8");
    } catch (error) {
        if (allowMissing && errorCodeIs(error, "ENOENT")) {
            return podRecipeResolve({});
        }
        const details = error instanceof Error && error.message ? error.message : "could not read recipe";
        throw new Error(`Failed to read recipe at ${recipePath}: ${details}`);
    }

    let parsed: unknown;
    try {
        parsed = parse(rawText);
    } catch (error) {
        const details = error instanceof Error && error.message ? error.message : "invalid yaml";
        throw new Error(`Failed to parse recipe at ${recipePath}: ${details}`);
    }

    try {
        return podRecipeResolve(parsed);
    } catch (error) {
        const details = error instanceof Error && error.message ? error.message : "unknown recipe error";
        throw new Error(`Invalid recipe at ${recipePath}: ${details}`);
    }
}

function errorCodeIs(error: unknown, code: string): boolean {
    return typeof error === "object" && error !== null && "code" in error && error.code === code;
}
