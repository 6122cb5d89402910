/**
 * @fileoverview Artifact barrel exports
 *
 * @module @review-intake/engine/artifacts
 */

export {
    findArtifactDirectory,
    ancestorVersionTag,
    resolveArtifact,
    type ResolveArtifactOptions,
} from "./ArtifactResolver.js";
