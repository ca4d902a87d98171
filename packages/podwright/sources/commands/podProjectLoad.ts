import { basename, dirname, resolve } from "node:path";
import { podRecipeRead } from "../config/podRecipeRead.js";
import { podRecipeResolve } from "../config/podRecipeResolve.js";
import { POD_RECIPE_FILE } from "../constants.js";
import type { PodInputPaths } from "../paths/podInputsResolve.js";
import type { PodRecipe } from "../types.js";

export interface PodProjectLoadOverrides {
    manifest?: string;
    code?: string;
    policy?: string;
    repository?: string;
}

export interface PodProject {
    recipePath: string;
    recipe: PodRecipe;
    /** Directory of the recipe file; inputs are resolved against it. */
    contextDirectory: string;
    paths: PodInputPaths;
}

/**
 * Loads the recipe and applies command line overrides.
 * Expects: override paths are relative to the working directory, recipe paths to the recipe file.
 */
export async function podProjectLoad(
    recipeOption: string,
    overrides: PodProjectLoadOverrides = {},
    cwd = process.cwd()
): Promise<PodProject> {
    const recipePath = resolve(cwd, recipeOption);
    // Only the default recipe may be absent; a named one must exist.
    const recipeLoaded = await podRecipeRead(recipePath, recipeOption === POD_RECIPE_FILE);
    const recipe = overrides.repository
        ? podRecipeResolve({ ...recipeLoaded, repository: overrides.repository })
        : recipeLoaded;
    const contextDirectory = dirname(recipePath);

    return {
        recipePath,
        recipe,
        contextDirectory,
        paths: {
            manifest: overrides.manifest ? resolve(cwd, overrides.manifest) : recipe.manifest,
            makefile: recipe.makefile,
            codeTree: overrides.code ? resolve(cwd, overrides.code) : recipe.codeTree,
            policy: overrides.policy ? resolve(cwd, overrides.policy) : recipe.policy
        }
    };
}

export function podProjectLabel(project: PodProject): string {
    return `${basename(project.contextDirectory)} (${project.recipePath})`;
}
