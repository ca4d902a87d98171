import { z } from "zod";
import {
    POD_DEFAULT_BASE_IMAGE,
    POD_DEFAULT_CODE_TREE,
    POD_DEFAULT_GLOBAL_TOOLS,
    POD_DEFAULT_MAKEFILE,
    POD_DEFAULT_MANIFEST,
    POD_DEFAULT_POLICY,
    POD_DEFAULT_REPOSITORY,
    POD_DEFAULT_VENV_PATH,
    POD_DEFAULT_WORKDIR,
    POD_IDENTITY_ENV,
    POD_RESERVED_ENVS
} from "../constants.js";
import type { PodRecipe } from "../types.js";

const envNameSchema = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "must be a valid environment variable name");
const absolutePathSchema = z.string().min(1).startsWith("/", "must be an absolute container path");
const packageNameSchema = z.string().regex(/^[A-Za-z0-9][A-Za-z0-9._+\-=<>~!\[\],]*$/, "must be a package spec");

const podRecipeSchema = z
    .object({
        baseImage: z.string().min(1).optional(),
        workdir: absolutePathSchema.optional(),
        venvPath: absolutePathSchema.optional(),
        globalTools: z.array(packageNameSchema).optional(),
        systemPackages: z.array(packageNameSchema).optional(),
        env: z.record(envNameSchema, z.string()).optional(),
        manifest: z.string().min(1).optional(),
        makefile: z.string().min(1).optional(),
        codeTree: z.string().min(1).optional(),
        codeDestination: z
            .string()
            .regex(/^[A-Za-z0-9._-]+(\/[A-Za-z0-9._-]+)*$/, "must be a relative path inside the workdir")
            .refine(
                (value) => value.split("/").every((segment) => segment !== "." && segment !== ".."),
                "must be a relative path inside the workdir"
            )
            .optional(),
        policy: z.string().min(1).optional(),
        repository: z
            .string()
            .regex(/^[a-z0-9]+([._/-][a-z0-9]+)*(:[0-9]+)?(\/[a-z0-9]+([._-][a-z0-9]+)*)*$/, "must be a docker repository")
            .optional(),
        identityVariable: envNameSchema.optional(),
        requirePinned: z.boolean().optional()
    })
    .strict();

/**
 * Resolves raw recipe input into a fully defaulted pod recipe.
 * Expects: rawRecipe is a plain object (or null for an empty document).
 */
export function podRecipeResolve(rawRecipe: unknown): PodRecipe {
    const parsed = podRecipeSchema.parse(rawRecipe ?? {});
    const identityVariable = parsed.identityVariable ?? POD_IDENTITY_ENV;
    const env = parsed.env ?? {};

    const reserved = new Set<string>([...POD_RESERVED_ENVS, identityVariable]);
    const collisions = Object.keys(env).filter((name) => reserved.has(name));
    if (collisions.length > 0) {
        throw new Error(`env must not override reserved variables: ${collisions.join(", ")}`);
    }

    return {
        baseImage: parsed.baseImage ?? POD_DEFAULT_BASE_IMAGE,
        workdir: parsed.workdir ?? POD_DEFAULT_WORKDIR,
        venvPath: parsed.venvPath ?? POD_DEFAULT_VENV_PATH,
        globalTools: parsed.globalTools ?? [...POD_DEFAULT_GLOBAL_TOOLS],
        systemPackages: parsed.systemPackages ?? [],
        env,
        manifest: parsed.manifest ?? POD_DEFAULT_MANIFEST,
        makefile: parsed.makefile ?? POD_DEFAULT_MAKEFILE,
        codeTree: parsed.codeTree ?? POD_DEFAULT_CODE_TREE,
        codeDestination: parsed.codeDestination,
        policy: parsed.policy ?? POD_DEFAULT_POLICY,
        repository: parsed.repository ?? POD_DEFAULT_REPOSITORY,
        identityVariable,
        requirePinned: parsed.requirePinned ?? false
    };
}
