import type { PodInstruction, PodLayer, PodStageContext } from "../types.js";
import { podLayerCreate } from "./podLayerCreate.js";
import { podShellQuote } from "./podShellQuote.js";

/**
 * Installs global tools (the cloud CLI) into the base interpreter's package space.
 * Runs before the isolated environment exists so its dependencies cannot be shadowed later.
 */
export function podStageToolsBuild(base: PodLayer<"base">, context: PodStageContext): PodLayer<"tools"> {
    const instructions: PodInstruction[] = [];
    if (context.recipe.globalTools.length > 0) {
        instructions.push({
            kind: "run",
            command: `pip3 install ${context.recipe.globalTools.map(podShellQuote).join(" ")}`
        });
    }
    return podLayerCreate("tools", base, instructions);
}
