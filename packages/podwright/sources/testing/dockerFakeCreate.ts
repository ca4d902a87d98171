import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { Readable } from "node:stream";
import type Docker from "dockerode";
import { type Mock, vi } from "vitest";

export interface DockerFakeImage {
    Id: string;
    Config: { Env: string[] };
}

export interface DockerFakeBuildContext {
    context: string;
    src: string[];
}

export interface DockerFakeBuildOptions {
    t: string;
    dockerfile?: string;
    buildargs?: Record<string, string>;
    labels?: Record<string, string>;
}

export interface DockerFake {
    docker: Docker;
    images: Map<string, DockerFakeImage>;
    buildImage: Mock<(context: DockerFakeBuildContext, options: DockerFakeBuildOptions) => Promise<Readable>>;
    tag: Mock<(reference: string, options: { repo: string; tag: string }) => void>;
    /** Image tags whose build stream reports an error. */
    failingTags: Set<string>;
    /** Dockerfile text each build received, by image tag. */
    dockerfiles: Map<string, string>;
}

/**
 * Creates an in-memory stand-in for the dockerode calls the pipeline makes.
 * Built images get sequential ids and carry `env` as their config environment.
 */
export function dockerFakeCreate(env: string[] = []): DockerFake {
    const images = new Map<string, DockerFakeImage>();
    const failingTags = new Set<string>();
    const dockerfiles = new Map<string, string>();
    let built = 0;

    const buildImage = vi.fn(async (context: DockerFakeBuildContext, options: DockerFakeBuildOptions) => {
        dockerfiles.set(options.t, await readFile(join(context.context, options.dockerfile ?? "Dockerfile"), "utf-8"));
        if (failingTags.has(options.t)) {
            return Readable.from([
                '{"stream":"Step 2/2 : RUN pip install -r /root/requirements.txt\\n"}\n',
                '{"errorDetail":{"message":"returned a non-zero code: 1"},"error":"returned a non-zero code: 1"}\n'
            ]);
        }
        built += 1;
        images.set(options.t, { Id: `sha256:image${built}`, Config: { Env: env } });
        return Readable.from([`{"stream":"Successfully tagged ${options.t}\\n"}\n`]);
    });

    const tag = vi.fn((_reference: string, _options: { repo: string; tag: string }) => {});
    const getImage = vi.fn((reference: string) => ({
        inspect: async () => {
            const image = images.get(reference);
            if (!image) {
                throw Object.assign(new Error(`No such image: ${reference}`), { statusCode: 404 });
            }
            return image;
        },
        tag: async (options: { repo: string; tag: string }) => {
            tag(reference, options);
            const image = images.get(reference);
            if (!image) {
                throw Object.assign(new Error(`No such image: ${reference}`), { statusCode: 404 });
            }
            images.set(`${options.repo}:${options.tag}`, image);
        }
    }));

    const docker = { buildImage, getImage } as unknown as Docker;
    return { docker, images, buildImage, tag, failingTags, dockerfiles };
}
