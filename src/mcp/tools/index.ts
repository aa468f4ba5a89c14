/**
 * @fileoverview MCP Tools registration.
 * @module mcp/tools
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import * as path from 'path';

import type { Logger } from '../../types/base.js';
import type { BuildInformation } from '../../types/build.js';
import type { ConnectorKind } from '../../types/config.js';
import type { Version } from '../../types/version.js';
import { createBuildInformation } from '../../core/build/assembler.js';
import { errorMessage } from '../../core/errors.js';
import { parseTagHistory, parseVersion } from '../../core/version/parser.js';
import { resolveBaseline } from '../../core/version/baseline.js';
import { createConnector, type ConnectorDependencies } from '../../connectors/factory.js';
import { loadConfig, mergeConfigs } from '../../state/config.js';
import { consoleLogger } from '../../utils/logger.js';
import { mapResult } from '../../utils/result.js';

// ============================================================
// Types
// ============================================================

export interface BuildInformationArgs {
  readonly version?: string | undefined;
  readonly connector?: ConnectorKind | undefined;
  readonly cwd?: string | undefined;
}

export type ToolOutcome =
  | { readonly ok: true; readonly payload: unknown }
  | { readonly ok: false; readonly message: string };

// ============================================================
// Helper Functions
// ============================================================

function getProjectRoot(cwd?: string): string {
  return cwd ? path.resolve(cwd) : process.cwd();
}

/**
 * Shapes build information for JSON output, dropping known issues when the
 * configuration says so.
 */
export function toPayload(info: BuildInformation, includeKnownIssues: boolean): BuildInformation {
  return includeKnownIssues ? info : { ...info, knownIssues: [] };
}

function toText(outcome: ToolOutcome) {
  if (!outcome.ok) {
    return { content: [{ type: 'text' as const, text: outcome.message }], isError: true };
  }
  return { content: [{ type: 'text' as const, text: JSON.stringify(outcome.payload, null, 2) }] };
}

// ============================================================
// Handlers
// ============================================================

/**
 * Loads configuration, selects a connector and assembles build information.
 */
export async function handleBuildInformation(
  args: BuildInformationArgs,
  deps: ConnectorDependencies = {},
  logger: Logger = consoleLogger
): Promise<ToolOutcome> {
  const root = getProjectRoot(args.cwd ?? deps.cwd);

  const loaded = mapResult(await loadConfig(root), base =>
    args.connector ? mergeConfigs(base, { connector: args.connector }) : base
  );
  if (!loaded.ok) {
    return { ok: false, message: `Configuration error (${loaded.error.type}): ${loaded.error.message}` };
  }
  const config = loaded.value;

  const connector = await createConnector(config, { ...deps, cwd: root, logger });
  if (!connector.ok) {
    return { ok: false, message: connector.error.message };
  }

  try {
    const info = await createBuildInformation(connector.value, {
      version: args.version,
      logger,
      concurrency: config.concurrency,
    });
    return { ok: true, payload: toPayload(info, config.report.includeKnownIssues) };
  } catch (error) {
    return { ok: false, message: errorMessage(error) };
  }
}

export function handleParseVersion(tag: string): ToolOutcome {
  return { ok: true, payload: parseVersion(tag) };
}

export function handleResolveBaseline(tags: readonly string[], target: string): ToolOutcome {
  const version = parseVersion(target);
  if (!version) {
    return { ok: false, message: `Version '${target}' is not a valid version tag.` };
  }
  const baseline: Version | null = resolveBaseline(parseTagHistory(tags), version);
  return { ok: true, payload: { target: version, baseline } };
}

// ============================================================
// Tool Registration
// ============================================================

export function registerTools(server: McpServer): void {
  // --------------------------------------------------------
  // tagnotes_build_information
  // --------------------------------------------------------
  server.tool(
    'tagnotes_build_information',
    'Collect build information for a version: baseline version, commit hashes, changes, bugs fixed and known issues. Without a version the checkout must be at the newest tag.',
    {
      version: z.string().optional().describe('Target version tag, e.g. v2.1.0. Defaults to the newest tag.'),
      connector: z.enum(['auto', 'git', 'github', 'mock']).optional().describe('Override the configured connector'),
      cwd: z.string().optional().describe('Repository root. Defaults to the server working directory.'),
    },
    async ({ version, connector, cwd }) => toText(await handleBuildInformation({ version, connector, cwd }))
  );

  // --------------------------------------------------------
  // tagnotes_parse_version
  // --------------------------------------------------------
  server.tool(
    'tagnotes_parse_version',
    'Parse a tag into semantic core, pre-release and build metadata. Returns null for tags that are not versions.',
    {
      tag: z.string().describe('Tag name, e.g. Rel_1.2.3.rc.4+build.5'),
    },
    async ({ tag }) => toText(handleParseVersion(tag))
  );

  // --------------------------------------------------------
  // tagnotes_resolve_baseline
  // --------------------------------------------------------
  server.tool(
    'tagnotes_resolve_baseline',
    'Select the baseline version for a target from a tag history (oldest first). Pre-releases compare against the previous tag, releases against the previous release.',
    {
      tags: z.array(z.string()).describe('Tag history, oldest first'),
      target: z.string().describe('Target version tag'),
    },
    async ({ tags, target }) => toText(handleResolveBaseline(tags, target))
  );
}
