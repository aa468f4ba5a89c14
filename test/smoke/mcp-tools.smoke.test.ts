/**
 * @fileoverview Smoke tests for the MCP tool handlers.
 * Quick sanity checks that each tool answers with the mock connector.
 *
 * @module test/smoke/mcp-tools
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
    handleBuildInformation,
    handleParseVersion,
    handleResolveBaseline,
} from '../../src/mcp/tools/index.js';
import { createServer, SERVER_NAME } from '../../src/mcp/server.js';
import { CONFIG_FILE } from '../../src/state/config.js';
import * as tagnotes from '../../src/index.js';
import { createRecordingLogger, createStubRunner } from '../__mocks__/stubs.js';

// ============================================================
// Test Fixtures
// ============================================================

let root: string;

beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'tagnotes-smoke-'));
});

afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
});

async function writeConfig(config: unknown): Promise<void> {
    await fs.writeFile(path.join(root, CONFIG_FILE), JSON.stringify(config), 'utf-8');
}

// ============================================================
// tagnotes_build_information
// ============================================================

describe('Smoke: build information tool', () => {
    it('assembles build information with the mock connector', async () => {
        const outcome = await handleBuildInformation({ connector: 'mock', cwd: root }, {}, createRecordingLogger());

        expect(outcome).toMatchObject({
            ok: true,
            payload: {
                fromVersion: { tag: 'ver-1.1.0' },
                toVersion: { tag: '2.0.0' },
                fromHash: 'def456ghi789',
                toHash: 'mno345pqr678',
                bugs: [{ id: '2' }],
                changes: [{ id: '3' }],
                knownIssues: [{ id: '4' }, { id: '5' }],
            },
        });
    });

    it('passes an explicit version through', async () => {
        const outcome = await handleBuildInformation(
            { connector: 'mock', cwd: root, version: 'v1.0.0' },
            {},
            createRecordingLogger()
        );

        expect(outcome).toMatchObject({ ok: true, payload: { fromVersion: null, changes: [{ id: '1' }] } });
    });

    it('drops known issues when the configuration says so', async () => {
        await writeConfig({ connector: 'mock', report: { includeKnownIssues: false } });

        const outcome = await handleBuildInformation({ cwd: root }, {}, createRecordingLogger());

        expect(outcome).toMatchObject({ ok: true, payload: { knownIssues: [] } });
    });

    it('reports version errors as messages', async () => {
        const outcome = await handleBuildInformation(
            { connector: 'mock', cwd: root, version: 'latest' },
            {},
            createRecordingLogger()
        );

        expect(outcome).toEqual({ ok: false, message: "Version 'latest' is not a valid version tag." });
    });

    it('reports configuration errors', async () => {
        await fs.writeFile(path.join(root, CONFIG_FILE), '{ not json', 'utf-8');

        const outcome = await handleBuildInformation({ cwd: root }, {}, createRecordingLogger());

        expect(outcome.ok).toBe(false);
        if (outcome.ok) return;
        expect(outcome.message).toMatch(/^Configuration error \(parse\): Invalid JSON in \.tagnotes\.json: /);
    });

    it('reports a missing token for an explicit github connector', async () => {
        await writeConfig({
            connector: 'github',
            github: { owner: 'example', repo: 'repo', tokenEnv: 'TAGNOTES_SMOKE_TOKEN' },
        });

        const outcome = await handleBuildInformation(
            { cwd: root },
            { env: {}, runner: createStubRunner({}) },
            createRecordingLogger()
        );

        expect(outcome).toEqual({ ok: false, message: 'GitHub token not found in $TAGNOTES_SMOKE_TOKEN' });
    });
});

// ============================================================
// tagnotes_parse_version / tagnotes_resolve_baseline
// ============================================================

describe('Smoke: version tools', () => {
    it('parses a version tag', () => {
        expect(handleParseVersion('v2.0.0-alpha.1')).toMatchObject({
            ok: true,
            payload: { semanticCore: '2.0.0', preRelease: 'alpha.1', isPreRelease: true },
        });
    });

    it('returns a null payload for a non-version tag', () => {
        expect(handleParseVersion('latest')).toEqual({ ok: true, payload: null });
    });

    it('resolves a baseline from a tag list', () => {
        const outcome = handleResolveBaseline(['v1.0.0', 'ver-1.1.0', 'release_2.0.0-beta.1', 'v2.0.0-rc.1'], '2.0.0');

        expect(outcome).toMatchObject({
            ok: true,
            payload: { target: { fullVersion: '2.0.0' }, baseline: { tag: 'ver-1.1.0' } },
        });
    });

    it('rejects an unparseable target', () => {
        expect(handleResolveBaseline(['v1.0.0'], 'next')).toEqual({
            ok: false,
            message: "Version 'next' is not a valid version tag.",
        });
    });
});

// ============================================================
// Server
// ============================================================

describe('Smoke: server', () => {
    it('creates a server with every tool registered', () => {
        expect(SERVER_NAME).toBe('tagnotes');
        expect(() => createServer()).not.toThrow();
    });
});

// ============================================================
// Library Entry Point
// ============================================================

describe('Smoke: library entry point', () => {
    it('assembles build information through the public exports', async () => {
        const info = await tagnotes.createBuildInformation(new tagnotes.MockConnector(), {
            version: 'v2.0.0-rc.1',
            logger: createRecordingLogger(),
        });

        expect(info.fromVersion?.tag).toBe('release_2.0.0-beta.1');
        expect(tagnotes.getDefault().connector).toBe('auto');
        expect(tagnotes.mapResult(tagnotes.ok(2), n => n * 2)).toEqual({ ok: true, value: 4 });
    });
});
