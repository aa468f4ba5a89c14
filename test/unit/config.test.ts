/**
 * @fileoverview Unit tests for configuration loading, validation and merging.
 * @module test/unit/config
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
    CONFIG_FILE,
    getDefault,
    loadConfig,
    mergeConfigs,
    validateConfig,
} from '../../src/state/config.js';

// ============================================================
// Test Helpers
// ============================================================

let root: string;

beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'tagnotes-config-'));
});

afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
});

async function writeConfig(content: string): Promise<void> {
    await fs.writeFile(path.join(root, CONFIG_FILE), content, 'utf-8');
}

// ============================================================
// Loading
// ============================================================

describe('loadConfig', () => {
    it('returns the defaults when no file exists', async () => {
        const result = await loadConfig(root);

        expect(result).toEqual({ ok: true, value: getDefault() });
    });

    it('merges a partial file over the defaults', async () => {
        await writeConfig(JSON.stringify({
            connector: 'github',
            github: { owner: 'example', tokenEnv: 'TAGNOTES_TOKEN' },
        }));

        const result = await loadConfig(root);

        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value.connector).toBe('github');
        expect(result.value.concurrency).toBe(8);
        expect(result.value.github).toEqual({
            owner: 'example',
            repo: null,
            tokenEnv: 'TAGNOTES_TOKEN',
            apiUrl: 'https://api.github.com',
        });
        expect(result.value.report.includeKnownIssues).toBe(true);
    });

    it('reports malformed JSON as a parse error', async () => {
        await writeConfig('{ "connector": ');

        const result = await loadConfig(root);

        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.type).toBe('parse');
        expect(result.error.message).toMatch(/^Invalid JSON in \.tagnotes\.json: /);
    });

    it('reports schema violations as validation errors', async () => {
        await writeConfig(JSON.stringify({ concurrency: 0 }));

        const result = await loadConfig(root);

        expect(result).toEqual({
            ok: false,
            error: { type: 'validation', message: 'concurrency: Number must be greater than or equal to 1' },
        });
    });
});

// ============================================================
// Validation
// ============================================================

describe('validateConfig', () => {
    it('accepts an empty object', () => {
        expect(validateConfig({})).toEqual({ ok: true, value: {} });
    });

    it('rejects unknown top-level keys', () => {
        const result = validateConfig({ colour: 'blue' });

        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.type).toBe('validation');
        expect(result.error.message).toBe("config: Unrecognized key(s) in object: 'colour'");
    });

    it('rejects an unknown connector', () => {
        const result = validateConfig({ connector: 'svn' });

        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.message.startsWith('connector: ')).toBe(true);
    });

    it('rejects a non-boolean report flag with its path', () => {
        const result = validateConfig({ report: { includeKnownIssues: 'yes' } });

        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.message.startsWith('report.includeKnownIssues: ')).toBe(true);
    });

    it('rejects an api url that is not a URL', () => {
        expect(validateConfig({ github: { apiUrl: 'not a url' } }).ok).toBe(false);
    });
});

// ============================================================
// Merging
// ============================================================

describe('mergeConfigs', () => {
    it('keeps base values the override leaves out', () => {
        const merged = mergeConfigs(getDefault(), { report: { includeKnownIssues: false } });

        expect(merged.connector).toBe('auto');
        expect(merged.github).toEqual(getDefault().github);
        expect(merged.report).toEqual({ includeKnownIssues: false });
    });

    it('lets an explicit null clear the owner', () => {
        const base = mergeConfigs(getDefault(), { github: { owner: 'example' } });
        const merged = mergeConfigs(base, { github: { owner: null } });

        expect(merged.github.owner).toBeNull();
    });

    it('replaces the connector', () => {
        expect(mergeConfigs(getDefault(), { connector: 'mock' }).connector).toBe('mock');
    });
});
