import { POD_TAG_ARG } from "../constants.js";
import type { PodLayer, PodStageContext } from "../types.js";
import { podLayerCreate } from "./podLayerCreate.js";

/**
 * Exposes the externally supplied version tag as the identity variable.
 * Expects: versionTag comes from the build driver; an absent tag stays unbound and expands to empty.
 */
export function podStageStampBuild(payload: PodLayer<"payload">, context: PodStageContext): PodLayer<"stamp"> {
    const args: Record<string, string> = {};
    if (context.versionTag !== undefined) {
        args[POD_TAG_ARG] = context.versionTag;
    }

    return podLayerCreate(
        "stamp",
        payload,
        [
            { kind: "arg", name: POD_TAG_ARG },
            { kind: "env", name: context.recipe.identityVariable, value: `$${POD_TAG_ARG}` }
        ],
        [],
        args
    );
}
