import { createHash } from "node:crypto";
import { lstat, readdir, readFile, readlink } from "node:fs/promises";
import { join } from "node:path";
import type { PodInput } from "../types.js";

/**
 * Computes a sha256 content digest for a file or a directory tree.
 * Covers everything COPY carries: relative paths, entry types, permission bits, file bytes and symlink targets.
 */
export async function podInputDigest(input: Pick<PodInput, "kind" | "hostPath">): Promise<string> {
    const hash = createHash("sha256");

    if (input.kind === "file") {
        const stats = await lstat(input.hostPath);
        hash.update(`file ${podModeFormat(stats.mode)}\n`);
        hash.update(await readFile(input.hostPath));
        return hash.digest("hex");
    }

    for (const record of await podTreeRecordsList(input.hostPath, "")) {
        hash.update(`${record}\n`);
    }
    return hash.digest("hex");
}

async function podTreeRecordsList(root: string, prefix: string): Promise<string[]> {
    const entries = await readdir(join(root, prefix), { withFileTypes: true });
    const records: string[] = [];

    for (const entry of entries.sort((left, right) => (left.name < right.name ? -1 : left.name > right.name ? 1 : 0))) {
        const relativePath = prefix.length > 0 ? `${prefix}/${entry.name}` : entry.name;
        const hostPath = join(root, relativePath);

        if (entry.isSymbolicLink()) {
            records.push(`link\0${relativePath}\0${await readlink(hostPath)}`);
            continue;
        }

        const stats = await lstat(hostPath);
        if (entry.isDirectory()) {
            records.push(`dir\0${relativePath}\0${podModeFormat(stats.mode)}`);
            records.push(...(await podTreeRecordsList(root, relativePath)));
            continue;
        }
        if (entry.isFile()) {
            const fileDigest = createHash("sha256")
                .update(await readFile(hostPath))
                .digest("hex");
            records.push(`file\0${relativePath}\0${podModeFormat(stats.mode)}\0${fileDigest}`);
        }
    }

    return records;
}

function podModeFormat(mode: number): string {
    return (mode & 0o777).toString(8).padStart(3, "0");
}
