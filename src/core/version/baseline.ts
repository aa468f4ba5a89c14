/**
 * @fileoverview Target and baseline version resolution.
 *
 * The baseline is the earlier version a changelog is computed against:
 * - a pre-release compares against the tag immediately before it, whatever
 *   kind that tag is
 * - a release compares against the closest earlier release, skipping any
 *   pre-releases in between
 * No baseline means the range starts at the beginning of history.
 *
 * @module core/version/baseline
 */

import type { Version } from '../../types/version.js';
import { VersionResolutionError } from '../errors.js';
import { parseVersion } from './parser.js';

// ============================================================
// Tag Lookup
// ============================================================

/**
 * Finds a version in tag history by its full version, ignoring case.
 *
 * @param tags - Tag history, oldest first
 * @param fullVersion - Full version to look for (prefix already stripped)
 * @returns Index of the first match, or -1
 */
export function findTagIndex(tags: readonly Version[], fullVersion: string): number {
    const needle = fullVersion.toLowerCase();
    return tags.findIndex(tag => tag.fullVersion.toLowerCase() === needle);
}

// ============================================================
// Baseline Resolution
// ============================================================

/**
 * Selects the baseline version for a target.
 *
 * When the target is not in history yet it is treated as coming after the
 * newest tag.
 *
 * @param orderedTags - Tag history, oldest first, unique by tag name
 * @param target - The version being described
 * @returns The baseline, or null to compare from the start of history
 *
 * @example
 * const tags = parseTagHistory(['v1.0.0', 'ver-1.1.0', 'release_2.0.0-beta.1', 'v2.0.0-rc.1']);
 * resolveBaseline(tags, parseVersion('2.0.0')!)?.tag;        // 'ver-1.1.0'
 * resolveBaseline(tags, parseVersion('v2.0.0-rc.1')!)?.tag;  // 'release_2.0.0-beta.1'
 */
export function resolveBaseline(
    orderedTags: readonly Version[],
    target: Version
): Version | null {
    if (orderedTags.length === 0) {
        return null;
    }

    const index = findTagIndex(orderedTags, target.fullVersion);
    const startIndex = index === -1 ? orderedTags.length - 1 : index - 1;

    if (target.isPreRelease) {
        return orderedTags[startIndex] ?? null;
    }

    for (let i = startIndex; i >= 0; i--) {
        const candidate = orderedTags[i];
        if (candidate && !candidate.isPreRelease) {
            return candidate;
        }
    }
    return null;
}

// ============================================================
// Target Resolution
// ============================================================

/**
 * Inputs to {@link resolveTarget}.
 */
export interface TargetResolutionInput {
    /** Tag history, oldest first */
    readonly tags: readonly Version[];
    /** Version requested by the caller, if any */
    readonly explicitVersion?: string | undefined;
    /** Commit hash of the current checkout */
    readonly currentHash: string;
    /** Commit hash of the newest tag; null when there are no tags */
    readonly latestTagHash: string | null;
}

/**
 * Determines the target version.
 *
 * An explicit version is used as given. Otherwise the newest tag is the
 * target, but only when the checkout sits exactly on its commit.
 *
 * @throws VersionResolutionError when the explicit version does not parse,
 *   when there are no tags and no explicit version, or when the checkout is
 *   not at the newest tag
 */
export function resolveTarget(input: TargetResolutionInput): Version {
    const { tags, explicitVersion, currentHash, latestTagHash } = input;

    if (explicitVersion !== undefined) {
        const version = parseVersion(explicitVersion);
        if (!version) {
            throw new VersionResolutionError(
                `Version '${explicitVersion}' is not a valid version tag.`,
                { explicitVersion }
            );
        }
        return version;
    }

    const latest = tags[tags.length - 1];
    if (!latest) {
        throw new VersionResolutionError(
            'No tags found in repository and no version specified. Please provide a version.'
        );
    }

    if (latestTagHash === null || latestTagHash.trim() !== currentHash.trim()) {
        throw new VersionResolutionError(
            `Target version not specified and current commit does not match latest tag '${latest.tag}'. Please provide a version.`,
            { latestTag: latest.tag, currentHash: currentHash.trim() }
        );
    }

    return latest;
}
