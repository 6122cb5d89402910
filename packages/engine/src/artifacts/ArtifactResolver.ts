/**
 * @fileoverview Artifact Resolver
 *
 * Locates the deployed classifier artifact on a directory tree, loads
 * it, and derives its version tag. Runs once at process start and
 * never fails the start: a missing or broken artifact yields an
 * `unavailable` result.
 *
 * @module @review-intake/engine/artifacts/ArtifactResolver
 */

import { readdirSync, existsSync, statSync, type Dirent } from "fs";
import { join, dirname, basename } from "path";
import type {
    ArtifactLoader,
    ClassifierArtifact,
    LoadedArtifact,
    VersionTagResolver,
} from "../contracts/ClassifierArtifact.js";
import { UNKNOWN_VERSION, unavailableArtifact } from "../contracts/ClassifierArtifact.js";
import type { EventLogger } from "../contracts/EventSink.js";
import { describeError } from "../contracts/IntakeError.js";

/**
 * Options for resolving the artifact.
 */
export interface ResolveArtifactOptions {
    /** Root of the artifact tree */
    readonly root: string;

    /** File whose presence marks an artifact directory */
    readonly markerFile: string;

    /** Loads the classifier from the found directory */
    readonly loadClassifier: ArtifactLoader;

    /** Version tag resolver (default: parent directory name) */
    readonly versionTag?: VersionTagResolver;

    /** Receives the single startup event */
    readonly logger: EventLogger;
}

/**
 * Depth-first search for the first directory containing the marker file.
 *
 * A directory's own files are checked before its children; children are
 * visited in lexical order. A symbolic link to a file counts as the
 * marker; linked directories are not descended into. Unreadable
 * directories are skipped.
 *
 * @param root - Directory to start from
 * @param markerFile - Marker file name
 * @returns The directory path, or null if no marker exists under root
 */
export function findArtifactDirectory(root: string, markerFile: string): string | null {
    if (!existsSync(root) || !statSync(root).isDirectory()) {
        return null;
    }

    return search(root, markerFile);
}

function search(dir: string, markerFile: string): string | null {
    let entries: Dirent[];
    try {
        entries = readdirSync(dir, { withFileTypes: true });
    }
    catch {
        return null;
    }

    if (entries.some(entry => entry.name === markerFile && isFileEntry(dir, entry))) {
        return dir;
    }

    const children = entries
        .filter(entry => entry.isDirectory())
        .map(entry => entry.name)
        .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

    for (const child of children) {
        const found = search(join(dir, child), markerFile);
        if (found) {
            return found;
        }
    }

    return null;
}

/**
 * A regular file, or a symbolic link that resolves to one.
 */
function isFileEntry(dir: string, entry: Dirent): boolean {
    if (entry.isFile()) {
        return true;
    }
    if (!entry.isSymbolicLink()) {
        return false;
    }

    try {
        return statSync(join(dir, entry.name)).isFile();
    }
    catch {
        // Dangling link
        return false;
    }
}

/**
 * Version tag resolver that names the directory `levels` ancestors above
 * the artifact directory.
 *
 * @param levels - Ancestor levels to climb (0 = the artifact directory itself)
 *
 * @example
 * ```typescript
 * ancestorVersionTag(1)("mlruns/1/models/m-4f2a/artifacts");
 * // => "m-4f2a"
 * ```
 */
export function ancestorVersionTag(levels: number): VersionTagResolver {
    return (artifactDir: string): string => {
        let current = artifactDir;
        for (let i = 0; i < levels; i++) {
            current = dirname(current);
        }

        const tag = basename(current);
        return tag === "" || tag === "." || tag === ".." ? UNKNOWN_VERSION : tag;
    };
}

/**
 * Resolve, load and version the classifier artifact.
 *
 * Emits exactly one event: success with path and version, or failure
 * with the reason.
 *
 * @returns A frozen artifact value; never rejects
 */
export async function resolveArtifact(options: ResolveArtifactOptions): Promise<ClassifierArtifact> {
    const { root, markerFile, loadClassifier, logger } = options;
    const versionTag = options.versionTag ?? ancestorVersionTag(1);

    let artifactDir: string | null;
    try {
        artifactDir = findArtifactDirectory(root, markerFile);
    }
    catch (error) {
        return unavailable(logger, `search failed: ${describeError(error)}`, root);
    }

    if (!artifactDir) {
        return unavailable(logger, `no ${markerFile} found under ${root}`, root);
    }

    let version: string;
    try {
        version = versionTag(artifactDir) || UNKNOWN_VERSION;
    }
    catch (error) {
        return unavailable(logger, `version tag failed: ${describeError(error)}`, root);
    }

    try {
        const classifier = await loadClassifier(artifactDir);

        const artifact: LoadedArtifact = Object.freeze({
            status: "loaded" as const,
            classifier,
            version,
            path  : artifactDir,
        });

        logger.record("info", "Classifier artifact loaded", {
            artifact_path: artifactDir,
            model_version: version,
        });

        return artifact;
    }
    catch (error) {
        return unavailable(logger, `load failed: ${describeError(error)}`, root);
    }
}

function unavailable(logger: EventLogger, reason: string, root: string): ClassifierArtifact {
    logger.record("error", "Classifier artifact unavailable", {
        reason,
        artifact_root: root,
        model_version: UNKNOWN_VERSION,
    });
    return unavailableArtifact(reason);
}
