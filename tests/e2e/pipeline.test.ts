/**
 * End-to-End Pipeline Tests
 * Full runs against a temp data directory with in-process git, dvc, table and upstream
 */
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { VerificationFailure } from '../../src/pipeline/errors.js';
import { createHarness, type Harness, type HarnessOptions } from '../helpers/pipeline-harness.js';
import { InMemoryRelationalSink } from '../helpers/memory-sink.js';
import { apodPayload, MutableClient } from '../helpers/mutable-client.js';

vi.mock('../../src/observability/logger.js', () => import('../helpers/mock-logger.js'));

/**
 * Table that accepts writes but never finds them again
 */
class ForgetfulSink extends InMemoryRelationalSink {
    override async countByDate(): Promise<number> {
        return 0;
    }
}

describe('APOD pipeline end to end', () => {
    let dir: string;
    let clock: Date;
    let client: MutableClient;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'apod-e2e-'));
        clock = new Date('2024-03-05T12:00:00Z');
        client = new MutableClient({ kind: 'success', status: 200, payload: apodPayload('2024-03-05') });
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    function harness(options: Partial<HarnessOptions> = {}): Harness {
        return createHarness({ dir, client, now: () => clock, ...options });
    }

    it('should load, version, commit and push a live record', async () => {
        const { runner, git, table, csvPath } = harness();

        const result = await runner.run({ runId: 'run-1' });

        expect(result.runId).toBe('run-1');
        expect(result.date).toBe('2024-03-05');
        expect(result.extraction).toEqual({ provenance: 'live', attempts: 1, finalState: 'success' });
        expect(result.verification).toEqual({ postgresCount: 1, csvExists: true, csvRowCount: 1, passed: true });
        expect(result.metadata.source).toBe('simulated');
        expect(result.metadata.documentPath).toBe(join(dir, 'apod_data.csv.dvc'));
        expect(result.commit).toEqual({
            hash: git.head,
            madeNewCommit: true,
            changedPaths: ['.gitignore', 'apod_data.csv.dvc'],
            reason: 'committed',
        });
        expect(result.versioning).toEqual({
            csvChecksum: result.metadata.checksum,
            metadataPresent: true,
            metadataSource: 'simulated',
            repoDirty: true,
        });
        expect(result.publish).toEqual({ ok: true, reason: 'pushed', branch: 'main' });

        expect(git.history()).toEqual(['Update APOD data version for 2024-03-05']);
        expect(git.remoteRefs.get('refs/remotes/origin/main')).toBe(git.head);
        expect(table.rows.get('2024-03-05')?.title).toBe('Sky on 2024-03-05');
        expect(await readFile(join(dir, '.gitignore'), 'utf8')).toBe('/apod_data.csv\n');

        const csvLines = (await readFile(csvPath, 'utf8')).trim().split('\n');
        expect(csvLines).toHaveLength(2);
        expect(csvLines[1]).toBe(
            '2024-03-05,Sky on 2024-03-05,https://images.example.test/2024-03-05.jpg,'
            + 'https://images.example.test/2024-03-05_hd.jpg,image,A field of faint galaxies.,'
            + 'Example Observatory,2024-03-05T12:00:00.000Z,live'
        );
    });

    it('should not commit or push again when a rerun changes nothing', async () => {
        const { runner, git } = harness();

        const first = await runner.run();
        const second = await runner.run();

        expect(second.metadata.checksum).toBe(first.metadata.checksum);
        expect(second.csv.replaced).toBe(true);
        expect(second.commit).toEqual({
            hash: first.commit.hash,
            madeNewCommit: false,
            changedPaths: [],
            reason: 'clean',
        });
        expect(second.versioning.repoDirty).toBe(false);
        expect(second.publish).toEqual({ ok: true, reason: 'up-to-date', branch: 'main' });
        expect(git.history()).toHaveLength(1);
        expect(git.pushCount).toBe(1);
    });

    it('should add a commit for each new day', async () => {
        const { runner, git, csv } = harness();

        await runner.run();
        clock = new Date('2024-03-06T12:00:00Z');
        client.serve(apodPayload('2024-03-06'));
        const result = await runner.run();

        expect(result.csv).toEqual({ path: join(dir, 'apod_data.csv'), rowCount: 2, replaced: false });
        expect(result.commit.madeNewCommit).toBe(true);
        expect(git.history()).toEqual([
            'Update APOD data version for 2024-03-06',
            'Update APOD data version for 2024-03-05',
        ]);
        expect(git.pushCount).toBe(2);
        expect((await csv.readAll()).map(record => record.date)).toEqual(['2024-03-06', '2024-03-05']);
    });

    it('should version through the metadata tool when it is installed', async () => {
        const { runner, git } = harness({ git: { dvc: { version: '3.48.0' } } });

        const result = await runner.run();

        expect(result.metadata.source).toBe('real');
        expect(result.metadata.toolAvailability.version).toBe('3.48.0');
        expect(git.callsTo('dvc', 'init')).toHaveLength(1);
        expect(git.callsTo('dvc', 'add')).toHaveLength(1);
        expect(result.commit.changedPaths).toEqual(['.dvc/config', '.dvcignore', '.gitignore', 'apod_data.csv.dvc']);
    });

    it('should fall back to the simulated path when the tool fails at runtime', async () => {
        const { runner } = harness({ git: { dvc: { version: '3.48.0', failAdd: true } } });

        const result = await runner.run();

        expect(result.metadata.source).toBe('simulated');
        expect(result.metadata.toolAvailability.externalToolUsable).toBe(true);
        expect(result.commit.madeNewCommit).toBe(true);
    });

    it('should stop before versioning when verification fails', async () => {
        const { runner, git } = harness({ table: new ForgetfulSink() });

        const run = runner.run();

        await expect(run).rejects.toBeInstanceOf(VerificationFailure);
        await expect(run).rejects.toThrow('Verification failed for 2024-03-05: postgresCount=0, csvExists=true');
        expect(git.commits.size).toBe(0);
        expect(git.calls).toHaveLength(0);
    });

    it('should continue after failed verification when configured to', async () => {
        const { runner, git } = harness({
            table: new ForgetfulSink(),
            settings: { failOnVerificationFailure: false },
        });

        const result = await runner.run();

        expect(result.verification.passed).toBe(false);
        expect(result.commit.madeNewCommit).toBe(true);
        expect(git.history()).toEqual(['Update APOD data version for 2024-03-05']);
    });

    it('should commit without pushing when publishing is disabled', async () => {
        const { runner, git } = harness({ settings: { publishEnabled: false } });

        const result = await runner.run();

        expect(result.commit.madeNewCommit).toBe(true);
        expect(result.publish).toEqual({ ok: false, reason: 'disabled', branch: 'main' });
        expect(git.callsTo('git', 'push')).toHaveLength(0);
    });

    it('should report a missing remote without failing the run', async () => {
        const { runner, git } = harness({ remoteUrl: null });

        const result = await runner.run();

        expect(result.commit.madeNewCommit).toBe(true);
        expect(result.publish).toEqual({
            ok: false,
            reason: 'no-remote',
            branch: 'main',
            detail: 'Remote origin is not configured',
        });
        expect(git.pushCount).toBe(0);
    });
});
