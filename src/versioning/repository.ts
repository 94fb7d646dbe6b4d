/**
 * Repository Reconciler
 * Keeps the data repository prepared and commits metadata changes, at most once per change
 */
import { access, realpath } from 'fs/promises';
import { isAbsolute, join, relative } from 'path';
import { logger } from '../observability/logger.js';
import { commitsTotal } from '../observability/metrics.js';
import { RepositoryQueryError } from '../pipeline/errors.js';
import { runChecked, type CommandResult, type CommandRunner } from './command-runner.js';

// Paths the metadata tool maintains next to the document
const TOOL_PATHS = ['.gitignore', '.dvcignore', '.dvc/config'] as const;

export type CommitReason = 'committed' | 'clean' | 'commit-failed';

export interface CommitResult {
    hash: string | null;
    madeNewCommit: boolean;
    changedPaths: string[];
    reason: CommitReason;
}

export interface RepositoryOptions {
    repoDir: string;
    gitBinary: string;
    branch: string;
    authorName: string;
    authorEmail: string;
    remoteName: string;
    remoteUrl: string | null;
    timeoutMs: number;
}

export function commitLabelFor(date: string): string {
    return `Update APOD data version for ${date}`;
}

function lines(text: string): string[] {
    return text.split('\n').map(line => line.trim()).filter(Boolean);
}

export class RepositoryReconciler {
    constructor(
        private readonly runner: CommandRunner,
        private readonly options: RepositoryOptions
    ) {}

    private git(args: readonly string[]): Promise<CommandResult> {
        return this.runner.run(this.options.gitBinary, args, {
            cwd: this.options.repoDir,
            timeoutMs: this.options.timeoutMs,
        });
    }

    private gitChecked(args: readonly string[]): Promise<CommandResult> {
        return runChecked(this.runner, this.options.gitBinary, args, {
            cwd: this.options.repoDir,
            timeoutMs: this.options.timeoutMs,
        });
    }

    /**
     * Init, identity and remote; every step is skipped when already in place
     */
    async prepare(): Promise<void> {
        const { repoDir, branch, authorName, authorEmail, remoteName, remoteUrl } = this.options;

        if (!(await this.isRepositoryRoot())) {
            await this.gitChecked(['init', '-b', branch]);
            logger.info('Initialized git repository', { repoDir, branch });
        }

        const identity: Array<[string, string]> = [
            ['user.name', authorName],
            ['user.email', authorEmail],
        ];
        for (const [key, value] of identity) {
            const current = await this.git(['config', '--get', key]);
            if (current.code !== 0 || !current.stdout.trim()) {
                await this.gitChecked(['config', key, value]);
                logger.debug('Set git identity', { key });
            }
        }

        if (remoteUrl) {
            const remotes = await this.gitChecked(['remote']);
            if (!lines(remotes.stdout).includes(remoteName)) {
                await this.gitChecked(['remote', 'add', remoteName, remoteUrl]);
                logger.info('Added git remote', { remoteName });
            }
        }
    }

    /**
     * True only when repoDir is the top of its own work tree; an enclosing checkout does not count
     */
    async isRepositoryRoot(): Promise<boolean> {
        const toplevel = await this.git(['rev-parse', '--show-toplevel']);
        const path = toplevel.stdout.trim();
        if (toplevel.code !== 0 || !path) {
            return false;
        }
        const [top, own] = await Promise.all([
            realpath(path).catch(() => path),
            realpath(this.options.repoDir).catch(() => this.options.repoDir),
        ]);
        return top === own;
    }

    /**
     * Current HEAD commit, or null for a repository without commits
     */
    async headHash(): Promise<string | null> {
        const result = await this.git(['rev-parse', '--verify', '-q', 'HEAD']);
        if (result.code !== 0) {
            return null;
        }
        return result.stdout.trim() || null;
    }

    /**
     * Stage the metadata artifacts and commit only when they differ from HEAD.
     * Diff and commit are limited to those paths; anything else in the index stays staged.
     */
    async reconcile(commitLabel: string, documentPath: string): Promise<CommitResult> {
        const candidates = [this.toRepoPath(documentPath), ...TOOL_PATHS];
        const existing: string[] = [];
        for (const candidate of candidates) {
            const present = await access(join(this.options.repoDir, candidate)).then(() => true, () => false);
            if (present) {
                existing.push(candidate);
            }
        }

        if (existing.length === 0) {
            commitsTotal.inc({ result: 'clean' });
            const head = await this.headHash();
            logger.info('No metadata artifacts to commit', { head });
            return { hash: head, madeNewCommit: false, changedPaths: [], reason: 'clean' };
        }

        await this.gitChecked(['add', '--', ...existing]);

        const diff = await this.gitChecked(['diff', '--cached', '--name-only', '--', ...existing]);
        const changedPaths = lines(diff.stdout);
        const priorHash = await this.headHash();

        if (changedPaths.length === 0) {
            commitsTotal.inc({ result: 'clean' });
            logger.info('No changes to commit', { head: priorHash });
            return { hash: priorHash, madeNewCommit: false, changedPaths, reason: 'clean' };
        }

        const commit = await this.git(['commit', '-m', commitLabel, '--', ...existing]);
        if (commit.code !== 0) {
            commitsTotal.inc({ result: 'failed' });
            logger.error('Commit failed', undefined, {
                code: commit.code,
                stderr: commit.stderr.trim(),
                stdout: commit.stdout.trim(),
            });
            return { hash: priorHash, madeNewCommit: false, changedPaths, reason: 'commit-failed' };
        }

        const hash = await this.headHash();
        if (!hash) {
            throw new RepositoryQueryError('HEAD could not be read after commit');
        }

        const history = await this.git(['log', '--oneline', '-5']);
        if (history.code !== 0) {
            throw new RepositoryQueryError(`Commit log could not be read: ${history.stderr.trim()}`);
        }

        commitsTotal.inc({ result: 'committed' });
        logger.info('Committed metadata changes', {
            hash,
            message: commitLabel,
            changedPaths,
            recentCommits: lines(history.stdout),
        });

        return { hash, madeNewCommit: true, changedPaths, reason: 'committed' };
    }

    private toRepoPath(path: string): string {
        return isAbsolute(path) ? relative(this.options.repoDir, path) : path;
    }
}
