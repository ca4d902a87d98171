import { isAbsolute, relative, resolve, sep } from "node:path";
import type { PodInput, PodInputKind, PodInputs } from "../types.js";

export interface PodInputPaths {
    manifest: string;
    makefile: string;
    codeTree: string;
    policy: string;
}

/**
 * Resolves pipeline input paths against the build context directory.
 * Expects: every input lives inside contextDirectory, the way docker COPY requires.
 */
export function podInputsResolve(contextDirectory: string, paths: PodInputPaths): PodInputs {
    const contextDirectoryResolved = resolve(contextDirectory);

    return {
        contextDirectory: contextDirectoryResolved,
        manifest: podInputResolve(contextDirectoryResolved, paths.manifest, "file", "manifest"),
        makefile: podInputResolve(contextDirectoryResolved, paths.makefile, "file", "makefile"),
        codeTree: podInputResolve(contextDirectoryResolved, paths.codeTree, "directory", "code tree"),
        policy: podInputResolve(contextDirectoryResolved, paths.policy, "file", "policy")
    };
}

function podInputResolve(contextDirectory: string, path: string, kind: PodInputKind, label: string): PodInput {
    const hostPath = resolve(contextDirectory, path);
    const contextPath = relative(contextDirectory, hostPath);

    if (contextPath.length === 0 || contextPath.startsWith("..") || isAbsolute(contextPath)) {
        throw new Error(`${label} must be inside the context directory ${contextDirectory}: ${hostPath}`);
    }

    return {
        kind,
        hostPath,
        contextPath: contextPath.split(sep).join("/")
    };
}
