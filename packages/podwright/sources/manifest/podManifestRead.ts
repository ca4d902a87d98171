import { readFile } from "node:fs/promises";
import type { PodManifest } from "../types.js";
import { type PodManifestParseOptions, podManifestParse } from "./podManifestParse.js";

/**
 * Reads and validates the dependency manifest.
 * Expects: manifestPath points to a readable pip requirements file.
 */
export async function podManifestRead(manifestPath: string, options: PodManifestParseOptions): Promise<PodManifest> {
    let text: string;
    try {
        text = await readFile(manifestPath, "utf-8");
    } catch (error) {
        const details = error instanceof Error && error.message ? error.message : "could not read manifest";
        throw new Error(`Failed to read dependency manifest at ${manifestPath}: ${details}`);
    }
    return podManifestParse(manifestPath, text, options);
}
