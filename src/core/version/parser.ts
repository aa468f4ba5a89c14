/**
 * @fileoverview Version tag parsing.
 * Turns raw repository tags into {@link Version} values. Tags that do not
 * follow the version grammar are not errors; they simply yield null.
 *
 * Grammar: `[prefix]major.minor.patch[(-|.)prerelease][+metadata]`
 * - prefix: letters, `-` and `_`
 * - prerelease: alphanumerics, `.` and `-`, matched lazily so `+metadata`
 *   is never absorbed into it
 * - metadata: alphanumerics, `.` and `-`
 *
 * @module core/version/parser
 */

import type { Version } from '../../types/version.js';

// ============================================================
// Grammar
// ============================================================

const TAG_PATTERN =
    /^(?:[a-zA-Z_-]+)?(?<core>\d+\.\d+\.\d+)(?<separator>[-.])?(?<preRelease>[a-zA-Z0-9.-]+?)?(?:\+(?<metadata>[a-zA-Z0-9.-]+))?$/;

// ============================================================
// Parsing
// ============================================================

/**
 * Parses a tag into a Version.
 *
 * A pre-release is recognized only when both the separator and a non-empty
 * identifier follow the core version; `1.2.3-` is a release.
 *
 * @param tag - Raw tag name
 * @returns The parsed version, or null when the tag does not match the grammar
 *
 * @example
 * parseVersion('Rel_1.2.3.rc.4+build.5');
 * // { tag: 'Rel_1.2.3.rc.4+build.5', semanticCore: '1.2.3', preRelease: 'rc.4',
 * //   buildMetadata: 'build.5', fullVersion: '1.2.3.rc.4+build.5', isPreRelease: true }
 *
 * parseVersion('latest'); // null
 */
export function parseVersion(tag: string): Version | null {
    const match = TAG_PATTERN.exec(tag);
    const groups = match?.groups;
    if (!groups) {
        return null;
    }

    const semanticCore = groups['core'] ?? '';
    const separator = groups['separator'];
    const preReleaseCapture = groups['preRelease'];
    const metadata = groups['metadata'];

    const hasPreRelease =
        separator !== undefined && preReleaseCapture !== undefined && preReleaseCapture !== '';
    const preRelease = hasPreRelease ? preReleaseCapture : '';

    let fullVersion = semanticCore;
    if (hasPreRelease) {
        fullVersion += `${separator}${preRelease}`;
    }
    if (metadata !== undefined) {
        fullVersion += `+${metadata}`;
    }

    return Object.freeze({
        tag,
        semanticCore,
        preRelease,
        buildMetadata: metadata ?? '',
        fullVersion,
        isPreRelease: hasPreRelease,
    });
}

/**
 * Parses raw tag history into versions.
 * Blank lines and non-version tags are dropped, duplicate tag names keep
 * their first (oldest) position.
 *
 * @param rawTags - Tag names in chronological order
 * @returns Versions in the same order
 */
export function parseTagHistory(rawTags: readonly string[]): Version[] {
    const seen = new Set<string>();
    const versions: Version[] = [];

    for (const raw of rawTags) {
        const tag = raw.trim();
        if (tag === '' || seen.has(tag)) {
            continue;
        }
        seen.add(tag);

        const version = parseVersion(tag);
        if (version) {
            versions.push(version);
        }
    }

    return versions;
}
