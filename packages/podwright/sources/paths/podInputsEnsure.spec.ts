import { rm } from "node:fs/promises";
import { afterEach, describe, expect, it } from "vitest";
import { podProjectFixtureCreate } from "../testing/podProjectFixtureCreate.js";
import { podInputsEnsure } from "./podInputsEnsure.js";
import { podInputsResolve } from "./podInputsResolve.js";

const tempDirectories: string[] = [];

afterEach(async () => {
    for (const directory of tempDirectories.splice(0, tempDirectories.length)) {
        await rm(directory, { recursive: true, force: true });
    }
});

describe("podInputsEnsure", () => {
    it("accepts a complete checkout", async () => {
        const fixture = await podProjectFixtureCreate();
        tempDirectories.push(fixture.directory);
        const inputs = podInputsResolve(fixture.directory, {
            manifest: "requirements.txt",
            makefile: "in_container.mk",
            codeTree: "core",
            policy: "core/sandbox.config"
        });

        await expect(podInputsEnsure(inputs)).resolves.toBeUndefined();
    });

    it("fails when the manifest is missing", async () => {
        const fixture = await podProjectFixtureCreate();
        tempDirectories.push(fixture.directory);
        await rm(fixture.manifestPath);
        const inputs = podInputsResolve(fixture.directory, {
            manifest: "requirements.txt",
            makefile: "in_container.mk",
            codeTree: "core",
            policy: "core/sandbox.config"
        });

        await expect(podInputsEnsure(inputs)).rejects.toThrow(`dependency manifest not found at ${fixture.manifestPath}`);
    });

    it("fails when the code tree is a file", async () => {
        const fixture = await podProjectFixtureCreate();
        tempDirectories.push(fixture.directory);
        const inputs = podInputsResolve(fixture.directory, {
            manifest: "requirements.txt",
            makefile: "in_container.mk",
            codeTree: "in_container.mk",
            policy: "core/sandbox.config"
        });

        await expect(podInputsEnsure(inputs)).rejects.toThrow(`code tree is not a directory: ${fixture.makefilePath}`);
    });
});
