/**
 * Command Runner
 * Spawns external tools (git, dvc) with a timeout and captures their output
 */
import { spawn } from 'child_process';
import { logger } from '../observability/logger.js';
import { CommandFailedError, CommandNotFoundError } from '../pipeline/errors.js';

export interface CommandResult {
    code: number | null;
    stdout: string;
    stderr: string;
    timedOut: boolean;
}

export interface RunOptions {
    cwd?: string;
    timeoutMs?: number;
}

/**
 * Runs a command to completion. Resolves for any exit code; rejects only when
 * the process cannot be started.
 */
export interface CommandRunner {
    run(command: string, args: readonly string[], options?: RunOptions): Promise<CommandResult>;
}

export class SpawnCommandRunner implements CommandRunner {
    constructor(private readonly defaultTimeoutMs: number = 60000) {}

    run(command: string, args: readonly string[], options: RunOptions = {}): Promise<CommandResult> {
        const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;

        return new Promise((resolve, reject) => {
            // Own process group, so a timeout also reaches helpers the tool spawns
            const proc = spawn(command, [...args], {
                cwd: options.cwd,
                detached: true,
                stdio: ['ignore', 'pipe', 'pipe'],
                env: {
                    ...process.env,
                    GIT_TERMINAL_PROMPT: '0', // Never block on a credential prompt
                },
            });

            let stdout = '';
            let stderr = '';
            let timedOut = false;
            let settled = false;

            const finish = (code: number | null): void => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                logger.debug('Command finished', { command, args, code, timedOut });
                resolve({ code, stdout, stderr, timedOut });
            };

            const timer = setTimeout(() => {
                timedOut = true;
                killGroup(proc.pid);
                proc.stdout.destroy();
                proc.stderr.destroy();
                logger.warn('Command timed out', { command, args, timeoutMs });
                finish(null);
            }, timeoutMs);

            proc.stdout.setEncoding('utf8');
            proc.stderr.setEncoding('utf8');

            proc.stdout.on('data', (data: string) => {
                stdout += data;
            });

            proc.stderr.on('data', (data: string) => {
                stderr += data;
            });

            proc.on('close', (code) => {
                finish(code);
            });

            proc.on('error', (error: NodeJS.ErrnoException) => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                if (error.code === 'ENOENT') {
                    reject(new CommandNotFoundError(command));
                    return;
                }
                logger.error('Command spawn error', error, { command });
                reject(error);
            });
        });
    }
}

/**
 * SIGKILL the whole process group led by `pid`
 */
function killGroup(pid: number | undefined): void {
    if (pid === undefined) return;
    try {
        process.kill(-pid, 'SIGKILL');
    } catch (error) {
        // ESRCH: the group already exited
        if (!(error instanceof Error && 'code' in error && error.code === 'ESRCH')) {
            logger.warn('Could not kill command process group', {
                pid,
                error: error instanceof Error ? error.message : String(error),
            });
        }
    }
}

/**
 * Run and require exit code 0
 */
export async function runChecked(
    runner: CommandRunner,
    command: string,
    args: readonly string[],
    options?: RunOptions
): Promise<CommandResult> {
    const result = await runner.run(command, args, options);
    if (result.code !== 0) {
        throw new CommandFailedError(command, args, result.code, result.timedOut ? 'timed out' : result.stderr);
    }
    return result;
}
