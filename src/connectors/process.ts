/**
 * @fileoverview External command execution for connectors.
 * Commands run without a shell; arguments are passed as an array.
 *
 * @module connectors/process
 */

import { execFile } from 'child_process';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

/** Output larger than this is treated as a failure */
const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

// ============================================================
// Types
// ============================================================

/**
 * A command that exited unsuccessfully or could not be started.
 */
export class CommandError extends Error {
    constructor(
        public readonly command: string,
        public readonly args: readonly string[],
        public readonly exitCode: number | null,
        public readonly stderr: string,
    ) {
        super(`Command '${[command, ...args].join(' ')}' failed with exit code ${exitCode ?? 'unknown'}: ${stderr.trim()}`);
        this.name = 'CommandError';
    }
}

/**
 * Runs external commands. Connectors receive one so tests can substitute it.
 */
export interface CommandRunner {
    /** Runs a command and returns stdout with trailing whitespace removed */
    run(command: string, args: readonly string[]): Promise<string>;
    /** Like {@link run}, but returns null instead of throwing */
    tryRun(command: string, args: readonly string[]): Promise<string | null>;
}

// ============================================================
// Implementation
// ============================================================

function exitCodeOf(error: unknown): number | null {
    if (typeof error === 'object' && error !== null && 'code' in error) {
        const code = error.code;
        return typeof code === 'number' ? code : null;
    }
    return null;
}

function stderrOf(error: unknown): string {
    if (typeof error === 'object' && error !== null && 'stderr' in error) {
        const stderr = error.stderr;
        if (typeof stderr === 'string') return stderr;
    }
    return error instanceof Error ? error.message : String(error);
}

/**
 * Creates a runner that executes commands in `cwd`.
 *
 * @example
 * const runner = createCommandRunner(process.cwd());
 * const head = await runner.run('git', ['rev-parse', 'HEAD']);
 */
export function createCommandRunner(cwd: string): CommandRunner {
    const run = async (command: string, args: readonly string[]): Promise<string> => {
        try {
            const { stdout } = await execFileAsync(command, [...args], {
                cwd,
                encoding: 'utf-8',
                maxBuffer: MAX_OUTPUT_BYTES,
                windowsHide: true,
            });
            return stdout.trimEnd();
        } catch (error) {
            throw new CommandError(command, args, exitCodeOf(error), stderrOf(error));
        }
    };

    return {
        run,
        async tryRun(command, args) {
            try {
                return await run(command, args);
            } catch {
                return null;
            }
        },
    };
}

/**
 * Splits command output into trimmed, non-empty lines.
 */
export function outputLines(output: string): string[] {
    return output
        .split('\n')
        .map(line => line.trim())
        .filter(line => line !== '');
}
