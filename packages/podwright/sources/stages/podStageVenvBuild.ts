import { POD_VENV_ENV } from "../constants.js";
import type { PodLayer } from "../types.js";
import { podLayerCreate } from "./podLayerCreate.js";

/**
 * Creates the isolated environment and puts its bin directory first on PATH.
 */
export function podStageVenvBuild(tools: PodLayer<"tools">): PodLayer<"venv"> {
    return podLayerCreate("venv", tools, [
        { kind: "run", command: `python3 -m venv \${${POD_VENV_ENV}}` },
        { kind: "env", name: "PATH", value: `\${${POD_VENV_ENV}}/bin:$PATH` }
    ]);
}
