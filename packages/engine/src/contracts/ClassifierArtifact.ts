/**
 * Classifier Artifact Contract
 *
 * The outcome of resolving the deployed artifact at process start.
 * Built once, frozen, and passed by reference to every request handler.
 * An unavailable artifact is a valid state: the service runs and only
 * classification fails.
 */

import type { ClassifierPort } from "./ClassifierPort.js";

/**
 * Version tag used when no artifact could be resolved.
 */
export const UNKNOWN_VERSION = "unknown";

/**
 * Artifact found and loaded.
 */
export interface LoadedArtifact {
    readonly status: "loaded";

    /** Predict capability */
    readonly classifier: ClassifierPort;

    /** Opaque version identifier */
    readonly version: string;

    /** Directory holding the marker file */
    readonly path: string;
}

/**
 * No artifact: not found, or failed to load.
 */
export interface UnavailableArtifact {
    readonly status: "unavailable";

    readonly version: typeof UNKNOWN_VERSION;

    /** Why the artifact is unavailable */
    readonly reason: string;
}

export type ClassifierArtifact = LoadedArtifact | UnavailableArtifact;

/**
 * Derives a version tag from the artifact directory.
 *
 * The training pipeline encodes the version in the directory layout;
 * the tag is treated as an opaque string.
 */
export type VersionTagResolver = (artifactDir: string) => string;

/**
 * Loads a classifier from the artifact directory. Throws when the
 * artifact cannot be loaded.
 */
export type ArtifactLoader = (artifactDir: string) => Promise<ClassifierPort> | ClassifierPort;

/**
 * Type guard for a loaded artifact.
 */
export function isArtifactLoaded(artifact: ClassifierArtifact): artifact is LoadedArtifact {
    return artifact.status === "loaded";
}

/**
 * Build a frozen unavailable artifact.
 */
export function unavailableArtifact(reason: string): UnavailableArtifact {
    return Object.freeze({
        status : "unavailable" as const,
        version: UNKNOWN_VERSION,
        reason,
    });
}
