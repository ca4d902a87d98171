import type Docker from "dockerode";

/**
 * Inspects a local image, returning null when the daemon does not know it.
 * Expects: docker client can access the local Docker daemon.
 */
export async function dockerImageInspectIfExists(
    docker: Docker,
    imageRef: string
): Promise<Docker.ImageInspectInfo | null> {
    try {
        return await docker.getImage(imageRef).inspect();
    } catch (error) {
        if (dockerErrorStatusCode(error) === 404) {
            return null;
        }
        throw error;
    }
}

export function dockerErrorStatusCode(error: unknown): number | null {
    if (typeof error === "object" && error !== null && "statusCode" in error && typeof error.statusCode === "number") {
        return error.statusCode;
    }
    return null;
}
