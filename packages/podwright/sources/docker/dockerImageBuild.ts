import type Docker from "dockerode";

export interface DockerImageBuildInput {
    contextDirectory: string;
    /** Context entries to send, relative to contextDirectory; must include the Dockerfile. */
    sources: string[];
    dockerfile: string;
    tag: string;
    buildArgs: Record<string, string>;
    labels: Record<string, string>;
    onOutput?: (line: string) => void;
}

/**
 * Builds an image from a context directory and waits for the build to finish.
 * Expects: the daemon reports failures as an error record in the progress stream.
 */
export async function dockerImageBuild(docker: Docker, input: DockerImageBuildInput): Promise<void> {
    const stream = await docker.buildImage(
        { context: input.contextDirectory, src: input.sources },
        {
            t: input.tag,
            dockerfile: input.dockerfile,
            buildargs: input.buildArgs,
            labels: input.labels,
            rm: true,
            forcerm: true
        }
    );
    await dockerBuildOutputConsume(stream, input.onOutput);
}

/**
 * Reads newline-delimited JSON build progress and throws on the first error record.
 */
export async function dockerBuildOutputConsume(
    stream: NodeJS.ReadableStream,
    onOutput: (line: string) => void = () => undefined
): Promise<void> {
    let buffered = "";
    const failures: string[] = [];

    const handle = (line: string): void => {
        const trimmed = line.trim();
        if (trimmed.length === 0 || failures.length > 0) {
            return;
        }
        let record: unknown;
        try {
            record = JSON.parse(trimmed);
        } catch {
            onOutput(trimmed);
            return;
        }
        if (typeof record !== "object" || record === null) {
            return;
        }
        if ("error" in record && typeof record.error === "string") {
            failures.push(record.error.trim());
            return;
        }
        if ("stream" in record && typeof record.stream === "string") {
            const text = record.stream.trimEnd();
            if (text.length > 0) {
                onOutput(text);
            }
        }
    };

    for await (const chunk of stream) {
        buffered += typeof chunk === "string" ? chunk : chunk.toString("utf-8");
        const lines = buffered.split("\n");
        buffered = lines.pop() ?? "";
        lines.forEach(handle);
    }
    handle(buffered);

    if (failures.length > 0) {
        throw new Error(`docker build failed: ${failures.join("; ")}`);
    }
}
