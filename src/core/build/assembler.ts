/**
 * @fileoverview Build information assembly.
 *
 * Resolves target and baseline versions, fetches everything the aggregation
 * needs from a repository connector, and runs the aggregation once all
 * fetches have settled.
 *
 * Failure policy:
 * - structural facts (tags, hashes, change units) propagate their errors
 * - enrichment facts (linked issues, issue details, open issues) degrade to
 *   an empty or placeholder value and log a warning
 *
 * @module core/build/assembler
 */

import type { Logger } from '../../types/base.js';
import type { BuildInformation, ChangeItem, IssueDetails, IssueId } from '../../types/build.js';
import type { RepositoryConnector } from '../../connectors/types.js';
import { mapInBatches } from '../../utils/batch.js';
import { consoleLogger } from '../../utils/logger.js';
import { aggregateChanges, fallbackIssueDetails } from '../changes/aggregator.js';
import { AssemblyAbortedError, errorMessage } from '../errors.js';
import { parseTagHistory } from '../version/parser.js';
import { resolveBaseline, resolveTarget } from '../version/baseline.js';

// ============================================================
// Types
// ============================================================

/**
 * Options for {@link createBuildInformation}.
 */
export interface BuildInformationOptions {
    /** Target version; when omitted the checkout must sit on the newest tag */
    readonly version?: string | undefined;
    /** Aborts assembly between fetch stages */
    readonly signal?: AbortSignal | undefined;
    /** Receives warnings for degraded lookups; defaults to the console */
    readonly logger?: Logger | undefined;
    /** Maximum concurrent detail lookups (default 8) */
    readonly concurrency?: number | undefined;
}

const DEFAULT_CONCURRENCY = 8;

// ============================================================
// Helpers
// ============================================================

function checkAborted(signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
        throw new AssemblyAbortedError(signal.reason);
    }
}

/**
 * Runs an enrichment lookup, substituting `fallback` when it fails.
 */
async function enrich<T>(
    logger: Logger,
    description: string,
    lookup: () => Promise<T>,
    fallback: T
): Promise<T> {
    try {
        return await lookup();
    } catch (error) {
        logger.warn(`[tagnotes] ${description} failed, continuing without it: ${errorMessage(error)}`);
        return fallback;
    }
}

function freezeList(items: readonly ChangeItem[]): readonly ChangeItem[] {
    return Object.freeze(items.map(item => Object.freeze({ ...item })));
}

// ============================================================
// Assembly
// ============================================================

/**
 * Builds the build information for a target version.
 *
 * @param connector - Source of repository data
 * @param options - Target version, abort signal, logger, concurrency
 * @returns Frozen build information
 * @throws VersionResolutionError when the target cannot be determined
 * @throws AssemblyAbortedError when `options.signal` aborts
 * @throws ConnectorError when a structural lookup fails
 *
 * @example
 * const info = await createBuildInformation(new MockConnector());
 * info.toVersion.tag;      // '2.0.0'
 * info.fromVersion?.tag;   // 'ver-1.1.0'
 */
export async function createBuildInformation(
    connector: RepositoryConnector,
    options: BuildInformationOptions = {}
): Promise<BuildInformation> {
    const { version, signal } = options;
    const logger = options.logger ?? consoleLogger;
    const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;

    // Structural facts
    checkAborted(signal);
    const [rawTags, currentHash] = await Promise.all([
        connector.getTagHistory(),
        connector.getHashForTag(null),
    ]);
    const tags = parseTagHistory(rawTags);

    checkAborted(signal);
    const latest = tags[tags.length - 1];
    const latestTagHash = version === undefined && latest
        ? await connector.getHashForTag(latest.tag)
        : null;

    const target = resolveTarget({ tags, explicitVersion: version, currentHash, latestTagHash });
    const baseline = resolveBaseline(tags, target);

    checkAborted(signal);
    const [fromHash, units, openIssues] = await Promise.all([
        baseline ? connector.getHashForTag(baseline.tag) : Promise.resolve(null),
        connector.getChangeUnitsBetween(baseline, target),
        enrich<IssueDetails[]>(logger, 'Open issue lookup', () => connector.getOpenIssues(), []),
    ]);

    // Enrichment fan-out
    checkAborted(signal);
    const linkedLists = await mapInBatches(units, concurrency, unit =>
        enrich<IssueId[]>(logger, `Linked issue lookup for ${unit.id}`, () => connector.getLinkedIssues(unit), [])
    );
    const linkedIssues = new Map<string, readonly IssueId[]>(
        units.map((unit, index) => [unit.id, linkedLists[index] ?? []])
    );

    checkAborted(signal);
    const issueIds = [...new Set(linkedLists.flat())];
    const details = await mapInBatches(issueIds, concurrency, id =>
        enrich(logger, `Issue lookup for ${id}`, () => connector.getIssueDetails(id), fallbackIssueDetails(id))
    );
    const issueDetails = new Map<IssueId, IssueDetails>(
        issueIds.map((id, index) => [id, details[index] ?? fallbackIssueDetails(id)])
    );

    // Single-threaded aggregation over the settled data
    checkAborted(signal);
    const result = aggregateChanges({ units, linkedIssues, issueDetails, openIssues });

    return Object.freeze({
        fromVersion: baseline,
        toVersion: target,
        fromHash: fromHash === null ? null : fromHash.trim(),
        toHash: currentHash.trim(),
        changes: freezeList(result.changes),
        bugs: freezeList(result.bugs),
        knownIssues: freezeList(result.knownIssues),
    });
}
