export const POD_RECIPE_FILE = "podwright.yaml";

export const POD_DEFAULT_BASE_IMAGE = "python:3.8-slim-buster";
export const POD_DEFAULT_WORKDIR = "/root";
export const POD_DEFAULT_VENV_PATH = "/opt/venv";
export const POD_DEFAULT_GLOBAL_TOOLS = ["awscli"] as const;
export const POD_DEFAULT_REPOSITORY = "podwright/pod";
export const POD_DEFAULT_MANIFEST = "requirements.txt";
export const POD_DEFAULT_MAKEFILE = "in_container.mk";
export const POD_DEFAULT_CODE_TREE = "core";
export const POD_DEFAULT_POLICY = "core/sandbox.config";

// Names the staged manifest and Makefile take under the workdir.
export const POD_MANIFEST_TARGET = "requirements.txt";
export const POD_MAKEFILE_TARGET = "Makefile";

export const POD_IDENTITY_ENV = "FLYTE_INTERNAL_IMAGE";
export const POD_TAG_ARG = "tag";
export const POD_VENV_ENV = "VENV";
export const POD_LOCALE = "C.UTF-8";
export const POD_LOCALE_ENVS = ["LANG", "LC_ALL"] as const;

export const POD_LAYER_REPOSITORY = "podwright-layer";
export const POD_LAYER_HASH_LABEL = "podwright.layer.hash";
export const POD_LAYER_STAGE_LABEL = "podwright.layer.stage";
export const POD_LAYER_HASH_LENGTH = 32;
export const POD_CONTEXT_DOCKERFILE = ".podwright.Dockerfile";

export const POD_RESERVED_ENVS = [
    "PATH",
    "PYTHONPATH",
    POD_VENV_ENV,
    POD_IDENTITY_ENV,
    ...POD_LOCALE_ENVS
] as const;

// Docker's PATH for images that do not set one.
export const POD_DEFAULT_BASE_PATH = "/usr/local/sbin:/usr/local/bin:/usr/sbin:/usr/bin:/sbin:/bin";
