import { POD_LOCALE, POD_LOCALE_ENVS, POD_VENV_ENV } from "../constants.js";
import type { PodInstruction, PodLayer, PodStageContext } from "../types.js";
import { podLayerCreate } from "./podLayerCreate.js";
import { podShellQuote } from "./podShellQuote.js";

/**
 * Selects the base interpreter image and fixes workdir, locale and the isolated environment root.
 * System packages from the recipe are installed here, before any python tooling.
 */
export function podStageBaseBuild(context: PodStageContext): PodLayer<"base"> {
    const { recipe } = context;
    const instructions: PodInstruction[] = [
        { kind: "from", image: recipe.baseImage },
        { kind: "workdir", path: recipe.workdir },
        { kind: "env", name: POD_VENV_ENV, value: recipe.venvPath },
        ...POD_LOCALE_ENVS.map((name): PodInstruction => ({ kind: "env", name, value: POD_LOCALE })),
        ...Object.entries(recipe.env).map(([name, value]): PodInstruction => ({ kind: "env", name, value }))
    ];

    if (recipe.systemPackages.length > 0) {
        const packages = recipe.systemPackages.map(podShellQuote).join(" ");
        instructions.push({
            kind: "run",
            command: `apt-get update && apt-get install -y --no-install-recommends ${packages} && rm -rf /var/lib/apt/lists/*`
        });
    }

    return podLayerCreate("base", null, instructions);
}
