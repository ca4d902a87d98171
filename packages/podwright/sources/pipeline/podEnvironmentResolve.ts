import type { PodLayer } from "../types.js";

/**
 * Computes the environment of the produced image from the base image's environment.
 * Expands $VAR, ${VAR}, ${VAR:-default} and ${VAR:+alt} like the docker builder; unset names expand to "".
 */
export function podEnvironmentResolve(
    layers: readonly PodLayer[],
    baseEnv: Readonly<Record<string, string>>
): Record<string, string> {
    const env: Record<string, string> = { ...baseEnv };

    for (const layer of layers) {
        // Build arguments are scoped to the stage that declares them.
        const args = new Map<string, string>();
        for (const instruction of layer.instructions) {
            if (instruction.kind === "arg") {
                args.set(instruction.name, layer.args[instruction.name] ?? "");
                continue;
            }
            if (instruction.kind === "env") {
                env[instruction.name] = podEnvironmentExpand(instruction.value, (name) => {
                    if (Object.hasOwn(env, name)) {
                        return env[name];
                    }
                    return args.get(name);
                });
            }
        }
    }

    return env;
}

/**
 * Substitutes variable references in one value.
 * Expects: lookup returns undefined for names that are not set.
 */
export function podEnvironmentExpand(value: string, lookup: (name: string) => string | undefined): string {
    let result = "";
    let index = 0;

    while (index < value.length) {
        const char = value[index];

        if (char === "\\" && value[index + 1] === "$") {
            result += "$";
            index += 2;
            continue;
        }
        if (char !== "$") {
            result += char;
            index += 1;
            continue;
        }

        if (value[index + 1] === "{") {
            const close = value.indexOf("}", index + 2);
            if (close < 0) {
                throw new Error(`unterminated variable reference in "${value}"`);
            }
            result += podEnvironmentBracedExpand(value.slice(index + 2, close), lookup);
            index = close + 1;
            continue;
        }

        const match = /^[A-Za-z_][A-Za-z0-9_]*/.exec(value.slice(index + 1));
        if (!match) {
            result += "$";
            index += 1;
            continue;
        }
        result += lookup(match[0]) ?? "";
        index += 1 + match[0].length;
    }

    return result;
}

function podEnvironmentBracedExpand(body: string, lookup: (name: string) => string | undefined): string {
    const match = /^([A-Za-z_][A-Za-z0-9_]*)(?::([-+])(.*))?$/s.exec(body);
    const name = match?.[1];
    if (!match || !name) {
        throw new Error(`invalid variable reference "\${${body}}"`);
    }

    const current = lookup(name);
    const operator = match[2];
    const word = match[3] ?? "";
    if (operator === "-") {
        return current !== undefined && current.length > 0 ? current : word;
    }
    if (operator === "+") {
        return current !== undefined && current.length > 0 ? word : "";
    }
    return current ?? "";
}
