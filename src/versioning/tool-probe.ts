/**
 * Tool Availability Probe
 * Checks, on every call, that the metadata tool is on PATH and answers a version query
 */
import { constants } from 'fs';
import { access, stat } from 'fs/promises';
import { delimiter, isAbsolute, join } from 'path';
import { logger } from '../observability/logger.js';
import type { CommandRunner } from './command-runner.js';

export interface ToolAvailability {
    externalToolUsable: boolean;
    binaryPath: string | null;
    version: string | null;
    reason?: 'not-on-path' | 'version-query-failed' | 'spawn-failed';
}

export interface ToolProbeOptions {
    binary: string;
    timeoutMs: number;
    /** PATH to search; defaults to the process PATH at probe time */
    searchPath?: string;
}

async function isExecutableFile(candidate: string): Promise<boolean> {
    try {
        const info = await stat(candidate);
        if (!info.isFile()) return false;
        await access(candidate, constants.X_OK);
        return true;
    } catch {
        return false;
    }
}

/**
 * Resolve a binary name against a PATH string
 */
export async function resolveOnPath(binary: string, searchPath: string): Promise<string | null> {
    if (isAbsolute(binary) || binary.includes('/')) {
        return (await isExecutableFile(binary)) ? binary : null;
    }

    for (const dir of searchPath.split(delimiter)) {
        if (!dir) continue;
        const candidate = join(dir, binary);
        if (await isExecutableFile(candidate)) {
            return candidate;
        }
    }
    return null;
}

export class ToolAvailabilityProbe {
    constructor(
        private readonly runner: CommandRunner,
        private readonly options: ToolProbeOptions
    ) {}

    get binary(): string {
        return this.options.binary;
    }

    async probe(): Promise<ToolAvailability> {
        const searchPath = this.options.searchPath ?? process.env.PATH ?? '';
        const binaryPath = await resolveOnPath(this.options.binary, searchPath);

        if (!binaryPath) {
            logger.info('Metadata tool not found on PATH', { binary: this.options.binary });
            return { externalToolUsable: false, binaryPath: null, version: null, reason: 'not-on-path' };
        }

        try {
            const result = await this.runner.run(binaryPath, ['--version'], { timeoutMs: this.options.timeoutMs });
            if (result.code !== 0) {
                logger.warn('Metadata tool version query failed', {
                    binaryPath,
                    code: result.code,
                    timedOut: result.timedOut,
                    stderr: result.stderr.trim(),
                });
                return { externalToolUsable: false, binaryPath, version: null, reason: 'version-query-failed' };
            }

            const version = result.stdout.trim() || null;
            logger.info('Metadata tool available', { binaryPath, version });
            return { externalToolUsable: true, binaryPath, version };
        } catch (error) {
            logger.warn('Metadata tool could not be started', {
                binaryPath,
                error: error instanceof Error ? error.message : String(error),
            });
            return { externalToolUsable: false, binaryPath, version: null, reason: 'spawn-failed' };
        }
    }
}
