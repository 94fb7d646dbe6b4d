/**
 * Metadata Versioner Tests
 * Real path through the tool, simulated path through direct hashing
 */
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createHash } from 'crypto';
import { access, mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import YAML from 'yaml';
import {
    DvcMetadataProducer,
    MetadataVersioner,
    SimulatedMetadataProducer,
    type AvailabilityProbe,
    type MetadataProducer,
} from '../../src/versioning/metadata.js';
import { logger } from '../../src/observability/logger.js';
import { FakeGitRunner } from '../helpers/fake-git.js';

vi.mock('../../src/observability/logger.js', () => import('../helpers/mock-logger.js'));

const usable: AvailabilityProbe = {
    probe: async () => ({ externalToolUsable: true, binaryPath: '/usr/local/bin/dvc', version: '3.48.0' }),
};
const absent: AvailabilityProbe = {
    probe: async () => ({ externalToolUsable: false, binaryPath: null, version: null, reason: 'not-on-path' }),
};

const md5 = (text: string) => createHash('md5').update(text).digest('hex');

describe('MetadataVersioner', () => {
    let dir: string;
    let csvPath: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'apod-meta-'));
        csvPath = join(dir, 'apod_data.csv');
        await writeFile(csvPath, 'date,title\n2024-03-05,Nebula\n', 'utf8');
        vi.clearAllMocks();
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    describe('simulated path', () => {
        const versioner = () => new MetadataVersioner(absent, new SimulatedMetadataProducer(), new SimulatedMetadataProducer());

        it('should write a document in the tool layout', async () => {
            const result = await versioner().version(csvPath);

            const checksum = md5('date,title\n2024-03-05,Nebula\n');
            expect(result).toMatchObject({
                path: 'apod_data.csv',
                documentPath: `${csvPath}.dvc`,
                checksum,
                size: 29,
                source: 'simulated',
            });
            expect(result.toolAvailability.externalToolUsable).toBe(false);
            expect(result.fallbackReason).toBe('Metadata tool unavailable: not-on-path');

            const text = await readFile(`${csvPath}.dvc`, 'utf8');
            expect(text.startsWith('outs:\n- md5: ')).toBe(true);
            expect(YAML.parse(text)).toEqual({
                outs: [{ md5: checksum, size: 29, hash: 'md5', path: 'apod_data.csv' }],
            });
        });

        it('should ignore the data file in git', async () => {
            await versioner().version(csvPath);
            expect(await readFile(join(dir, '.gitignore'), 'utf8')).toBe('/apod_data.csv\n');
        });

        it('should append to an existing gitignore only once', async () => {
            await writeFile(join(dir, '.gitignore'), 'node_modules', 'utf8');

            await versioner().version(csvPath);
            await versioner().version(csvPath);

            expect(await readFile(join(dir, '.gitignore'), 'utf8')).toBe('node_modules\n/apod_data.csv\n');
        });

        it('should leave the document untouched when the checksum is unchanged', async () => {
            await versioner().version(csvPath);
            const before = await readFile(`${csvPath}.dvc`, 'utf8');

            await versioner().version(csvPath);

            expect(await readFile(`${csvPath}.dvc`, 'utf8')).toBe(before);
            expect(logger.info).toHaveBeenCalledWith('Metadata document unchanged', {
                documentPath: `${csvPath}.dvc`,
                checksum: md5('date,title\n2024-03-05,Nebula\n'),
            });
        });

        it('should replace the entry when the data changes', async () => {
            await versioner().version(csvPath);
            await writeFile(csvPath, 'date,title\n2024-03-06,Galaxy\n2024-03-05,Nebula\n', 'utf8');

            const result = await versioner().version(csvPath);

            const parsed: unknown = YAML.parse(await readFile(`${csvPath}.dvc`, 'utf8'));
            expect(parsed).toEqual({
                outs: [{
                    md5: md5('date,title\n2024-03-06,Galaxy\n2024-03-05,Nebula\n'),
                    size: 47,
                    hash: 'md5',
                    path: 'apod_data.csv',
                }],
            });
            expect(result.checksum).toBe(md5('date,title\n2024-03-06,Galaxy\n2024-03-05,Nebula\n'));
        });
    });

    describe('real path', () => {
        it('should initialize the tool and add the file', async () => {
            const runner = new FakeGitRunner({ dvc: { version: '3.48.0' } });
            const versioner = new MetadataVersioner(
                usable,
                new DvcMetadataProducer(runner, 'dvc', 1000),
                new SimulatedMetadataProducer()
            );

            const result = await versioner.version(csvPath);

            expect(result.source).toBe('real');
            expect(result.fallbackReason).toBeUndefined();
            expect(result.checksum).toBe(md5('date,title\n2024-03-05,Nebula\n'));
            expect(runner.calls.map(call => call.args)).toEqual([['init'], ['add', 'apod_data.csv']]);
            await expect(access(join(dir, '.dvc', 'config'))).resolves.toBeUndefined();
        });

        it('should skip init when the tool directory exists', async () => {
            const runner = new FakeGitRunner({ dvc: { version: '3.48.0' } });
            const producer = new DvcMetadataProducer(runner, 'dvc', 1000);

            await producer.produceMetadata(csvPath);
            await producer.produceMetadata(csvPath);

            expect(runner.calls.map(call => call.args[0])).toEqual(['init', 'add', 'add']);
        });

        it('should fall back to the simulated path when the tool fails at runtime', async () => {
            const runner = new FakeGitRunner({ dvc: { version: '3.48.0', failAdd: true } });
            const versioner = new MetadataVersioner(
                usable,
                new DvcMetadataProducer(runner, 'dvc', 1000),
                new SimulatedMetadataProducer()
            );

            const result = await versioner.version(csvPath);

            expect(result.source).toBe('simulated');
            expect(result.toolAvailability.externalToolUsable).toBe(true);
            expect(result.fallbackReason).toBe(
                "Metadata tool unavailable: dvc add apod_data.csv exited with code 255: ERROR: failed to add 'apod_data.csv'"
            );
            expect(YAML.parse(await readFile(`${csvPath}.dvc`, 'utf8'))).toEqual({
                outs: [{ md5: result.checksum, size: 29, hash: 'md5', path: 'apod_data.csv' }],
            });
        });

        it('should not call the tool when it is unavailable', async () => {
            const produceMetadata = vi.fn();
            const real: MetadataProducer = { source: 'real', produceMetadata };

            const result = await new MetadataVersioner(absent, real, new SimulatedMetadataProducer()).version(csvPath);

            expect(produceMetadata).not.toHaveBeenCalled();
            expect(result.source).toBe('simulated');
        });
    });

    it('should fail when the data file does not exist', async () => {
        const versioner = new MetadataVersioner(absent, new SimulatedMetadataProducer(), new SimulatedMetadataProducer());
        await expect(versioner.version(join(dir, 'missing.csv'))).rejects.toThrow('Data file not found');
    });
});
