/**
 * Publish Attempt
 * Best-effort push of the committed branch. Outcomes are results, never exceptions.
 */
import { logger } from '../observability/logger.js';
import { publishTotal } from '../observability/metrics.js';
import { CommandNotFoundError } from '../pipeline/errors.js';
import type { CommandResult, CommandRunner } from './command-runner.js';

export type PublishReason =
    | 'pushed'
    | 'up-to-date'
    | 'no-remote'
    | 'auth-failed'
    | 'rejected'
    | 'network'
    | 'timeout'
    | 'git-unavailable'
    | 'push-failed'
    | 'disabled';

export interface PublishResult {
    ok: boolean;
    reason: PublishReason;
    branch: string;
    detail?: string;
}

export interface PublishOptions {
    repoDir: string;
    gitBinary: string;
    remoteName: string;
    timeoutMs: number;
    pushTimeoutMs: number;
}

const AUTH_PATTERNS = [
    /authentication failed/,
    /permission denied/,
    /could not read username/,
    /invalid username or password/,
    /the requested url returned error: 40[13]/,
];

const REJECTED_PATTERNS = [
    /\[rejected\]/,
    /\[remote rejected\]/,
    /non-fast-forward/,
    /fetch first/,
];

const NETWORK_PATTERNS = [
    /could not resolve host/,
    /unable to access/,
    /connection refused/,
    /connection timed out/,
    /network is unreachable/,
    /could not read from remote repository/,
];

/**
 * Map push stderr to a reason code
 */
export function classifyPushFailure(stderr: string): PublishReason {
    const text = stderr.toLowerCase();
    if (AUTH_PATTERNS.some(pattern => pattern.test(text))) return 'auth-failed';
    if (REJECTED_PATTERNS.some(pattern => pattern.test(text))) return 'rejected';
    if (NETWORK_PATTERNS.some(pattern => pattern.test(text))) return 'network';
    return 'push-failed';
}

export class PublishAttempt {
    constructor(
        private readonly runner: CommandRunner,
        private readonly options: PublishOptions
    ) {}

    private git(args: readonly string[], timeoutMs = this.options.timeoutMs): Promise<CommandResult> {
        return this.runner.run(this.options.gitBinary, args, { cwd: this.options.repoDir, timeoutMs });
    }

    async publish(branch: string): Promise<PublishResult> {
        let result: PublishResult;
        try {
            result = await this.attempt(branch);
        } catch (error) {
            result = {
                ok: false,
                reason: error instanceof CommandNotFoundError ? 'git-unavailable' : 'push-failed',
                branch,
                detail: error instanceof Error ? error.message : String(error),
            };
        }

        publishTotal.inc({ reason: result.reason });
        if (result.ok) {
            logger.info('Publish finished', { branch: result.branch, reason: result.reason });
        } else {
            logger.warn('Publish did not complete', {
                branch: result.branch,
                reason: result.reason,
                detail: result.detail,
            });
        }
        return result;
    }

    private async attempt(branch: string): Promise<PublishResult> {
        const { remoteName, pushTimeoutMs } = this.options;

        const remotes = await this.git(['remote']);
        if (remotes.code !== 0) {
            return { ok: false, reason: 'push-failed', branch, detail: remotes.stderr.trim() };
        }
        const names = remotes.stdout.split('\n').map(name => name.trim());
        if (!names.includes(remoteName)) {
            return { ok: false, reason: 'no-remote', branch, detail: `Remote ${remoteName} is not configured` };
        }

        const pushBranch = await this.switchTo(branch);

        const head = await this.git(['rev-parse', 'HEAD']);
        if (head.code !== 0) {
            return { ok: false, reason: 'push-failed', branch: pushBranch, detail: 'Repository has no commits' };
        }

        const tracking = await this.git(['rev-parse', '--verify', '-q', `refs/remotes/${remoteName}/${pushBranch}`]);
        if (tracking.code === 0 && tracking.stdout.trim() === head.stdout.trim()) {
            return { ok: true, reason: 'up-to-date', branch: pushBranch };
        }

        logger.info('Pushing to remote', { remoteName, branch: pushBranch });
        const push = await this.git(['push', '-u', remoteName, pushBranch], pushTimeoutMs);

        if (push.timedOut) {
            return { ok: false, reason: 'timeout', branch: pushBranch, detail: `Push exceeded ${pushTimeoutMs}ms` };
        }
        if (push.code === 0) {
            return { ok: true, reason: 'pushed', branch: pushBranch };
        }
        return {
            ok: false,
            reason: classifyPushFailure(push.stderr),
            branch: pushBranch,
            detail: push.stderr.trim(),
        };
    }

    /**
     * Check out the target branch, creating it if needed; falls back to the current branch
     */
    private async switchTo(branch: string): Promise<string> {
        const current = await this.git(['rev-parse', '--abbrev-ref', 'HEAD']);
        const currentBranch = current.code === 0 ? current.stdout.trim() : '';
        if (currentBranch === branch) {
            return branch;
        }

        const checkout = await this.git(['checkout', branch]);
        if (checkout.code === 0) {
            return branch;
        }

        const create = await this.git(['checkout', '-b', branch]);
        if (create.code === 0) {
            logger.info('Created branch for publish', { branch });
            return branch;
        }

        logger.warn('Could not switch to target branch, pushing current branch', {
            target: branch,
            current: currentBranch,
            stderr: create.stderr.trim(),
        });
        return currentBranch || branch;
    }
}
