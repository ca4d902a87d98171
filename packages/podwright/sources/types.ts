export interface PodBuildCliOptions {
    recipe: string;
    tag?: string;
    manifest?: string;
    code?: string;
    policy?: string;
    repository?: string;
    history?: string;
    cache: boolean;
}

export interface PodDockerfileCliOptions {
    recipe: string;
    out?: string;
}

export interface PodPlanCliOptions {
    recipe: string;
    tag?: string;
    inspectBase?: boolean;
}

export interface PodRecipe {
    baseImage: string;
    workdir: string;
    venvPath: string;
    globalTools: string[];
    systemPackages: string[];
    env: Record<string, string>;
    manifest: string;
    makefile: string;
    codeTree: string;
    codeDestination?: string;
    policy: string;
    repository: string;
    identityVariable: string;
    requirePinned: boolean;
}

export type PodInputKind = "file" | "directory";

export interface PodInput {
    kind: PodInputKind;
    /** Absolute path on the host. */
    hostPath: string;
    /** POSIX path relative to the build context directory. */
    contextPath: string;
}

export interface PodInputs {
    contextDirectory: string;
    manifest: PodInput;
    makefile: PodInput;
    codeTree: PodInput;
    policy: PodInput;
}

export type PodInputDigests = {
    [K in Exclude<keyof PodInputs, "contextDirectory">]: string;
};

export interface PodManifest {
    path: string;
    requirements: PodRequirement[];
    options: string[];
}

export interface PodRequirement {
    line: number;
    name: string;
    raw: string;
    pinnedVersion?: string;
    /** URL, VCS or path the requirement installs from instead of an index. */
    location?: string;
    /** Per-requirement pip options such as --hash. */
    options?: string[];
}

export const POD_STAGES = ["base", "tools", "venv", "dependencies", "buildfile", "payload", "stamp"] as const;

export type PodStageName = (typeof POD_STAGES)[number];

export type PodInstruction =
    | { kind: "from"; image: string }
    | { kind: "workdir"; path: string }
    | { kind: "env"; name: string; value: string }
    | { kind: "arg"; name: string }
    | { kind: "run"; command: string }
    | { kind: "copy"; source: string; destination: string };

export interface PodLayerInput {
    contextPath: string;
    hostPath: string;
    digest: string;
}

export interface PodLayer<S extends PodStageName = PodStageName> {
    readonly stage: S;
    readonly parentHash: string | null;
    readonly instructions: readonly PodInstruction[];
    readonly inputs: readonly PodLayerInput[];
    /** Build arguments bound for this layer; unset arguments are absent. */
    readonly args: Readonly<Record<string, string>>;
    readonly hash: string;
}

export type PodPipelinePlan = readonly [
    PodLayer<"base">,
    PodLayer<"tools">,
    PodLayer<"venv">,
    PodLayer<"dependencies">,
    PodLayer<"buildfile">,
    PodLayer<"payload">,
    PodLayer<"stamp">
];

export interface PodStageContext {
    recipe: PodRecipe;
    inputs: PodInputs;
    digests: PodInputDigests;
    versionTag?: string;
}

export interface PodLayerRef {
    stage: PodStageName;
    hash: string;
    reference: string;
    imageId: string;
    reused: boolean;
}

export interface PodImageHandle {
    reference: string;
    imageId: string;
    versionTag?: string;
    layers: PodLayerRef[];
    environment: Record<string, string>;
}
