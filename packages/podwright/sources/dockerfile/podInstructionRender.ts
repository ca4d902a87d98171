import type { PodInstruction } from "../types.js";

/**
 * Renders one instruction as a Dockerfile line.
 * ENV values are double-quoted with variable references left for the builder to expand.
 */
export function podInstructionRender(instruction: PodInstruction): string {
    switch (instruction.kind) {
        case "from":
            return `FROM ${instruction.image}`;
        case "workdir":
            return `WORKDIR ${instruction.path}`;
        case "env":
            // A backslash before $ is kept as the escape for a literal dollar.
            return `ENV ${instruction.name}="${instruction.value.replace(/\\(?!\$)|"/g, (char) => `\\${char}`)}"`;
        case "arg":
            return `ARG ${instruction.name}`;
        case "run":
            return `RUN ${instruction.command}`;
        case "copy":
            if (/\s/.test(instruction.source) || /\s/.test(instruction.destination)) {
                return `COPY ${JSON.stringify([instruction.source, instruction.destination])}`;
            }
            return `COPY ${instruction.source} ${instruction.destination}`;
    }
}
