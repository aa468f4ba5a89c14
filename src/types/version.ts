/**
 * @fileoverview Version types parsed from repository tags.
 *
 * @module types/version
 */

/**
 * A repository tag parsed into its semantic-version parts.
 * Only `parseVersion` creates these; the object is frozen.
 *
 * @example
 * const v: Version = {
 *   tag: 'Rel_1.2.3.rc.4+build.5',
 *   semanticCore: '1.2.3',
 *   preRelease: 'rc.4',
 *   buildMetadata: 'build.5',
 *   fullVersion: '1.2.3.rc.4+build.5',
 *   isPreRelease: true
 * };
 */
export interface Version {
    /** The tag exactly as it appears in the repository */
    readonly tag: string;
    /** major.minor.patch */
    readonly semanticCore: string;
    /** Pre-release identifier, or '' for a release */
    readonly preRelease: string;
    /** Build metadata after '+', or '' */
    readonly buildMetadata: string;
    /** Tag with its leading prefix removed */
    readonly fullVersion: string;
    /** Always equal to `preRelease !== ''` */
    readonly isPreRelease: boolean;
}
