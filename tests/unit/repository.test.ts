/**
 * Repository Reconciler Tests
 */
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { commitLabelFor, RepositoryReconciler, type RepositoryOptions } from '../../src/versioning/repository.js';
import { RepositoryQueryError } from '../../src/pipeline/errors.js';
import { FakeGitRunner } from '../helpers/fake-git.js';

vi.mock('../../src/observability/logger.js', () => import('../helpers/mock-logger.js'));

describe('RepositoryReconciler', () => {
    let dir: string;
    let git: FakeGitRunner;
    let options: RepositoryOptions;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'apod-repo-'));
        git = new FakeGitRunner();
        options = {
            repoDir: dir,
            gitBinary: 'git',
            branch: 'main',
            authorName: 'APOD Pipeline',
            authorEmail: 'pipeline@apod.local',
            remoteName: 'origin',
            remoteUrl: 'https://example.test/apod-data.git',
            timeoutMs: 1000,
        };
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    const documentPath = () => join(dir, 'apod_data.csv.dvc');

    async function writeArtifacts(md5: string): Promise<void> {
        await writeFile(documentPath(), `outs:\n- md5: ${md5}\n  size: 10\n  hash: md5\n  path: apod_data.csv\n`, 'utf8');
        await writeFile(join(dir, '.gitignore'), '/apod_data.csv\n', 'utf8');
    }

    it('should build the commit label from the record date', () => {
        expect(commitLabelFor('2024-03-05')).toBe('Update APOD data version for 2024-03-05');
    });

    describe('prepare', () => {
        it('should init the repository, set identity and add the remote', async () => {
            await new RepositoryReconciler(git, options).prepare();

            expect(git.initialized).toBe(true);
            expect(git.currentBranch).toBe('main');
            expect(git.config.get('user.name')).toBe('APOD Pipeline');
            expect(git.config.get('user.email')).toBe('pipeline@apod.local');
            expect(git.remotes.get('origin')).toBe('https://example.test/apod-data.git');
        });

        it('should be idempotent', async () => {
            const repository = new RepositoryReconciler(git, options);
            await repository.prepare();
            await repository.prepare();

            expect(git.callsTo('git', 'init')).toHaveLength(1);
            expect(git.calls.filter(call => call.args[0] === 'remote' && call.args[1] === 'add')).toHaveLength(1);
            expect(git.calls.filter(call => call.args[0] === 'config' && call.args[1] !== '--get')).toHaveLength(2);
        });

        it('should keep an existing identity and remote URL', async () => {
            git.initialized = true;
            git.config.set('user.name', 'Data Team');
            git.remotes.set('origin', 'https://example.test/other.git');

            await new RepositoryReconciler(git, options).prepare();

            expect(git.callsTo('git', 'init')).toHaveLength(0);
            expect(git.config.get('user.name')).toBe('Data Team');
            expect(git.config.get('user.email')).toBe('pipeline@apod.local');
            expect(git.remotes.get('origin')).toBe('https://example.test/other.git');
        });

        it('should init its own repository inside an enclosing checkout', async () => {
            git.options.enclosingRepo = join(dir, '..');

            await new RepositoryReconciler(git, options).prepare();

            expect(git.callsTo('git', 'init')).toHaveLength(1);
            expect(git.calls[0]?.args).toEqual(['rev-parse', '--show-toplevel']);
            expect(git.calls[1]?.args).toEqual(['init', '-b', 'main']);
        });

        it('should not add a remote when none is configured', async () => {
            await new RepositoryReconciler(git, { ...options, remoteUrl: null }).prepare();
            expect(git.remotes.size).toBe(0);
        });
    });

    describe('reconcile', () => {
        it('should commit new metadata artifacts', async () => {
            const repository = new RepositoryReconciler(git, options);
            await repository.prepare();
            await writeArtifacts('a'.repeat(32));

            const result = await repository.reconcile(commitLabelFor('2024-03-05'), documentPath());

            expect(result).toEqual({
                hash: git.head,
                madeNewCommit: true,
                changedPaths: ['.gitignore', 'apod_data.csv.dvc'],
                reason: 'committed',
            });
            expect(git.history()).toEqual(['Update APOD data version for 2024-03-05']);
        });

        it('should not commit when nothing changed', async () => {
            const repository = new RepositoryReconciler(git, options);
            await repository.prepare();
            await writeArtifacts('a'.repeat(32));
            const first = await repository.reconcile(commitLabelFor('2024-03-05'), documentPath());

            const second = await repository.reconcile(commitLabelFor('2024-03-05'), documentPath());

            expect(second).toEqual({ hash: first.hash, madeNewCommit: false, changedPaths: [], reason: 'clean' });
            expect(git.callsTo('git', 'commit')).toHaveLength(1);
            expect(git.history()).toHaveLength(1);
        });

        it('should commit again when the checksum changes', async () => {
            const repository = new RepositoryReconciler(git, options);
            await repository.prepare();
            await writeArtifacts('a'.repeat(32));
            const first = await repository.reconcile(commitLabelFor('2024-03-05'), documentPath());

            await writeArtifacts('b'.repeat(32));
            const second = await repository.reconcile(commitLabelFor('2024-03-06'), documentPath());

            expect(second.madeNewCommit).toBe(true);
            expect(second.hash).not.toBe(first.hash);
            expect(second.changedPaths).toEqual(['apod_data.csv.dvc']);
            expect(git.history()).toEqual([
                'Update APOD data version for 2024-03-06',
                'Update APOD data version for 2024-03-05',
            ]);
        });

        it('should leave unrelated staged paths out of the commit', async () => {
            const repository = new RepositoryReconciler(git, options);
            await repository.prepare();
            await writeArtifacts('a'.repeat(32));
            git.index.set('notes.txt', 'work in progress');

            const result = await repository.reconcile(commitLabelFor('2024-03-05'), documentPath());

            expect(result.changedPaths).toEqual(['.gitignore', 'apod_data.csv.dvc']);
            expect(git.callsTo('git', 'commit')[0]?.args).toEqual([
                'commit', '-m', 'Update APOD data version for 2024-03-05', '--', 'apod_data.csv.dvc', '.gitignore',
            ]);
            const head = git.head ? git.commits.get(git.head) : undefined;
            expect([...(head?.tree.keys() ?? [])].sort()).toEqual(['.gitignore', 'apod_data.csv.dvc']);
            expect(git.index.get('notes.txt')).toBe('work in progress');
        });

        it('should stage the tool configuration when present', async () => {
            const repository = new RepositoryReconciler(git, options);
            await repository.prepare();
            await writeArtifacts('a'.repeat(32));
            await mkdir(join(dir, '.dvc'));
            await writeFile(join(dir, '.dvc', 'config'), '', 'utf8');
            await writeFile(join(dir, '.dvcignore'), '', 'utf8');

            const result = await repository.reconcile(commitLabelFor('2024-03-05'), documentPath());

            expect(result.changedPaths).toEqual(['.dvc/config', '.dvcignore', '.gitignore', 'apod_data.csv.dvc']);
        });

        it('should return a null hash for an empty repository with nothing to commit', async () => {
            const repository = new RepositoryReconciler(git, options);
            await repository.prepare();

            expect(await repository.reconcile(commitLabelFor('2024-03-05'), documentPath())).toEqual({
                hash: null,
                madeNewCommit: false,
                changedPaths: [],
                reason: 'clean',
            });
        });

        it('should report a failed commit without throwing', async () => {
            git.options.failCommit = true;
            const repository = new RepositoryReconciler(git, options);
            await repository.prepare();
            await writeArtifacts('a'.repeat(32));

            const result = await repository.reconcile(commitLabelFor('2024-03-05'), documentPath());

            expect(result).toEqual({
                hash: null,
                madeNewCommit: false,
                changedPaths: ['.gitignore', 'apod_data.csv.dvc'],
                reason: 'commit-failed',
            });
        });

        it('should raise when the log cannot be read after committing', async () => {
            git.options.failLog = true;
            const repository = new RepositoryReconciler(git, options);
            await repository.prepare();
            await writeArtifacts('a'.repeat(32));

            await expect(repository.reconcile(commitLabelFor('2024-03-05'), documentPath()))
                .rejects.toBeInstanceOf(RepositoryQueryError);
        });
    });
});
