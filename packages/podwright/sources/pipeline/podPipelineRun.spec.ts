import { mkdir, readFile, rm } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { podRecipeResolve } from "../config/podRecipeResolve.js";
import { dockerFakeCreate } from "../testing/dockerFakeCreate.js";
import { type PodProjectFixture, podProjectFixtureCreate } from "../testing/podProjectFixtureCreate.js";
import type { PodPipelinePlan } from "../types.js";
import { podLayerReferenceBuild, podPipelineRun } from "./podPipelineRun.js";
import { podPlanPrepare } from "./podPlanPrepare.js";
import { PodStageError } from "./podStageError.js";

const fixtures: PodProjectFixture[] = [];

afterEach(async () => {
    for (const fixture of fixtures.splice(0, fixtures.length)) {
        await rm(fixture.directory, { recursive: true, force: true });
    }
});

async function planCreate(versionTag?: string): Promise<{ fixture: PodProjectFixture; plan: PodPipelinePlan }> {
    const fixture = await podProjectFixtureCreate();
    fixtures.push(fixture);
    const { plan } = await podPlanPrepare(
        podRecipeResolve({}),
        fixture.directory,
        {
            manifest: fixture.manifestPath,
            makefile: fixture.makefilePath,
            codeTree: fixture.codeTreePath,
            policy: fixture.policyPath
        },
        versionTag
    );
    return { fixture, plan };
}

describe("podPipelineRun", () => {
    it("builds every layer in order from its parent layer", async () => {
        const { plan } = await planCreate("v123");
        const fake = dockerFakeCreate();

        const refs = await podPipelineRun(fake.docker, plan, { useCache: true });

        expect(refs.map((ref) => ref.stage)).toEqual(plan.map((layer) => layer.stage));
        expect(refs.every((ref) => !ref.reused)).toBe(true);
        expect(fake.buildImage).toHaveBeenCalledTimes(7);
        expect(fake.buildImage.mock.calls.map((call) => call[1].t)).toEqual(
            plan.map((layer) => `podwright-layer:${layer.hash}`)
        );
        expect(fake.buildImage.mock.calls[3]?.[0].src).toEqual([".podwright.Dockerfile", "requirements.txt"]);
        expect(fake.buildImage.mock.calls[5]?.[0].src).toEqual([".podwright.Dockerfile", "core"]);
        expect(fake.buildImage.mock.calls[6]?.[1].buildargs).toEqual({ tag: "v123" });
        expect(fake.buildImage.mock.calls[6]?.[1].labels).toEqual({
            "podwright.layer.hash": plan[6].hash,
            "podwright.layer.stage": "stamp"
        });
    });

    it("reuses every layer on an unchanged rerun", async () => {
        const { plan } = await planCreate("v123");
        const fake = dockerFakeCreate();

        const first = await podPipelineRun(fake.docker, plan, { useCache: true });
        fake.buildImage.mockClear();
        const second = await podPipelineRun(fake.docker, plan, { useCache: true });

        expect(fake.buildImage).not.toHaveBeenCalled();
        expect(second.every((ref) => ref.reused)).toBe(true);
        expect(second.map((ref) => ref.imageId)).toEqual(first.map((ref) => ref.imageId));
    });

    it("rebuilds layers when the cache is disabled", async () => {
        const { plan } = await planCreate("v123");
        const fake = dockerFakeCreate();

        await podPipelineRun(fake.docker, plan, { useCache: true });
        fake.buildImage.mockClear();
        await podPipelineRun(fake.docker, plan, { useCache: false });

        expect(fake.buildImage).toHaveBeenCalledTimes(7);
    });

    it("aborts at the first failed stage", async () => {
        const { plan } = await planCreate("v123");
        const fake = dockerFakeCreate();
        fake.failingTags.add(podLayerReferenceBuild(plan[3]));

        const run = podPipelineRun(fake.docker, plan, { useCache: true });

        await expect(run).rejects.toBeInstanceOf(PodStageError);
        await expect(run).rejects.toThrow("stage dependencies failed: docker build failed: returned a non-zero code: 1");
        expect(fake.buildImage).toHaveBeenCalledTimes(4);
        expect(fake.images.has(podLayerReferenceBuild(plan[4]))).toBe(false);
    });

    it("resumes at the failed stage on the next run", async () => {
        const { plan } = await planCreate("v123");
        const fake = dockerFakeCreate();
        fake.failingTags.add(podLayerReferenceBuild(plan[3]));
        await expect(podPipelineRun(fake.docker, plan, { useCache: true })).rejects.toThrow("stage dependencies");

        fake.failingTags.clear();
        fake.buildImage.mockClear();
        const refs = await podPipelineRun(fake.docker, plan, { useCache: true });

        expect(refs.map((ref) => ref.reused)).toEqual([true, true, true, false, false, false, false]);
        expect(fake.buildImage).toHaveBeenCalledTimes(4);
    });

    it("records stage history", async () => {
        const { fixture, plan } = await planCreate("v123");
        const fake = dockerFakeCreate();
        fake.failingTags.add(podLayerReferenceBuild(plan[1]));
        const historyPath = join(fixture.directory, "history", "build.jsonl");

        await expect(podPipelineRun(fake.docker, plan, { useCache: true, historyPath })).rejects.toThrow(
            "stage tools"
        );

        const records = (await readFile(historyPath, "utf-8"))
            .trim()
            .split("\n")
            .map((line) => JSON.parse(line));
        expect(records.map((record) => `${record.type}:${record.stage}`)).toEqual([
            "stage.start:base",
            "stage.complete:base",
            "stage.start:tools",
            "stage.failed:tools"
        ]);
        expect(records[3].error).toEqual({
            name: "Error",
            message: "docker build failed: returned a non-zero code: 1"
        });
    });

    it("raises the stage failure when its history record cannot be written", async () => {
        const { fixture, plan } = await planCreate("v123");
        const fake = dockerFakeCreate();
        // A directory in place of the history file makes every append fail.
        const historyPath = join(fixture.directory, "history.jsonl");
        await mkdir(historyPath);

        const run = podPipelineRun(fake.docker, plan, { useCache: true, historyPath });

        await expect(run).rejects.toBeInstanceOf(PodStageError);
        await expect(run).rejects.toThrow("stage base failed");
    });
});
