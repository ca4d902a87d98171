import { describe, expect, it } from "vitest";
import { podRecipeResolve } from "../config/podRecipeResolve.js";
import { podInputsResolve } from "../paths/podInputsResolve.js";
import type { PodStageContext } from "../types.js";
import { podPipelinePlan } from "./podPipelinePlan.js";

function contextBuild(overrides: Partial<PodStageContext> = {}): PodStageContext {
    return {
        recipe: podRecipeResolve({}),
        inputs: podInputsResolve("/tmp/project", {
            manifest: "requirements.txt",
            makefile: "in_container.mk",
            codeTree: "core",
            policy: "core/sandbox.config"
        }),
        digests: { manifest: "m1", makefile: "k1", codeTree: "c1", policy: "p1" },
        versionTag: "v123",
        ...overrides
    };
}

describe("podPipelinePlan", () => {
    it("plans the stages in order with chained parent hashes", () => {
        const plan = podPipelinePlan(contextBuild());

        expect(plan.map((layer) => layer.stage)).toEqual([
            "base",
            "tools",
            "venv",
            "dependencies",
            "buildfile",
            "payload",
            "stamp"
        ]);
        expect(plan[0].parentHash).toBeNull();
        for (let index = 1; index < plan.length; index += 1) {
            expect(plan[index]?.parentHash).toBe(plan[index - 1]?.hash);
        }
    });

    it("installs global tools before the isolated environment is created", () => {
        const plan = podPipelinePlan(contextBuild());

        expect(plan[1].instructions).toEqual([{ kind: "run", command: "pip3 install awscli" }]);
        expect(plan[2].instructions).toEqual([
            { kind: "run", command: "python3 -m venv ${VENV}" },
            { kind: "env", name: "PATH", value: "${VENV}/bin:$PATH" }
        ]);
    });

    it("declares the files each layer copies", () => {
        const plan = podPipelinePlan(contextBuild());

        expect(plan[3].inputs).toEqual([
            { contextPath: "requirements.txt", hostPath: "/tmp/project/requirements.txt", digest: "m1" }
        ]);
        expect(plan[5].inputs.map((input) => input.contextPath)).toEqual(["core/sandbox.config", "core"]);
        expect(plan[6].inputs).toEqual([]);
    });

    it("is deterministic for unchanged inputs", () => {
        const first = podPipelinePlan(contextBuild());
        const second = podPipelinePlan(contextBuild());

        expect(second.map((layer) => layer.hash)).toEqual(first.map((layer) => layer.hash));
    });

    it("keeps earlier layers when only the code tree changes", () => {
        const first = podPipelinePlan(contextBuild());
        const second = podPipelinePlan(
            contextBuild({ digests: { manifest: "m1", makefile: "k1", codeTree: "c2", policy: "p1" } })
        );

        expect(second.slice(0, 5).map((layer) => layer.hash)).toEqual(first.slice(0, 5).map((layer) => layer.hash));
        expect(second[5].hash).not.toBe(first[5].hash);
        expect(second[6].hash).not.toBe(first[6].hash);
    });

    it("binds the version tag only when one is supplied", () => {
        expect(podPipelinePlan(contextBuild())[6].args).toEqual({ tag: "v123" });
        expect(podPipelinePlan(contextBuild({ versionTag: undefined }))[6].args).toEqual({});
    });

    it("installs system packages in the base layer", () => {
        const plan = podPipelinePlan(contextBuild({ recipe: podRecipeResolve({ systemPackages: ["git", "ffmpeg"] }) }));

        expect(plan[0].instructions.at(-1)).toEqual({
            kind: "run",
            command:
                "apt-get update && apt-get install -y --no-install-recommends git ffmpeg && rm -rf /var/lib/apt/lists/*"
        });
    });

    it("quotes tool specs with shell metacharacters", () => {
        const plan = podPipelinePlan(contextBuild({ recipe: podRecipeResolve({ globalTools: ["awscli>=1.27"] }) }));

        expect(plan[1].instructions).toEqual([{ kind: "run", command: "pip3 install 'awscli>=1.27'" }]);
    });

    it("rejects a policy file that collides with the code destination", () => {
        const context = contextBuild({ recipe: podRecipeResolve({ codeDestination: "sandbox.config" }) });

        expect(() => podPipelinePlan(context)).toThrow("policy file and code tree would both be copied to /root/sandbox.config");
    });

    it("rejects a policy file that would overwrite the staged Makefile", () => {
        const context = contextBuild({
            inputs: podInputsResolve("/tmp/project", {
                manifest: "requirements.txt",
                makefile: "in_container.mk",
                codeTree: "core",
                policy: "policies/Makefile"
            })
        });

        expect(() => podPipelinePlan(context)).toThrow("policy file would overwrite the staged /root/Makefile");
    });

    it("rejects a code destination that would overwrite the staged manifest", () => {
        const context = contextBuild({ recipe: podRecipeResolve({ codeDestination: "requirements.txt" }) });

        expect(() => podPipelinePlan(context)).toThrow("code tree would overwrite the staged /root/requirements.txt");
    });
});
