/**
 * Metadata Versioner
 *
 * Produces the content-addressed metadata document (`<file>.dvc`) for the
 * tracked data file, through the external tool when it is usable and by
 * computing the same document directly otherwise.
 */
import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { readFile, stat, writeFile } from 'fs/promises';
import { basename, dirname, join } from 'path';
import YAML from 'yaml';
import { z } from 'zod';
import { logger } from '../observability/logger.js';
import { metadataVersionsTotal } from '../observability/metrics.js';
import { ToolUnavailableError } from '../pipeline/errors.js';
import { runChecked, type CommandRunner } from './command-runner.js';
import type { ToolAvailability } from './tool-probe.js';

export type MetadataSource = 'real' | 'simulated';

export interface MetadataResult {
    path: string;           // Data file path as recorded in the document
    documentPath: string;   // Absolute path of the metadata document
    checksum: string;       // MD5 hex digest of the data file
    size: number;
    source: MetadataSource;
}

export interface MetadataVersionOutcome extends MetadataResult {
    toolAvailability: ToolAvailability;
    fallbackReason?: string;    // Why the simulated path produced the document
}

/**
 * One way of producing the metadata document
 */
export interface MetadataProducer {
    readonly source: MetadataSource;
    produceMetadata(filePath: string): Promise<MetadataResult>;
}

export interface AvailabilityProbe {
    probe(): Promise<ToolAvailability>;
}

const metadataOutSchema = z
    .object({
        md5: z.string().regex(/^[a-f0-9]{32}$/),
        size: z.number().int().nonnegative().optional(),
        hash: z.string().optional(),
        path: z.string().min(1),
    })
    .passthrough();

const metadataDocumentSchema = z
    .object({
        outs: z.array(metadataOutSchema).min(1),
    })
    .passthrough();

export type MetadataOut = z.infer<typeof metadataOutSchema>;

export function metadataDocumentPath(filePath: string): string {
    return `${filePath}.dvc`;
}

/**
 * MD5 digest and size of a file
 */
export async function computeChecksum(filePath: string): Promise<{ md5: string; size: number }> {
    const hash = createHash('md5');
    let size = 0;

    for await (const chunk of createReadStream(filePath)) {
        const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
        hash.update(buffer);
        size += buffer.length;
    }

    return { md5: hash.digest('hex'), size };
}

/**
 * Read the output entry for `fileName` from a metadata document; null when absent or unreadable
 */
export async function readMetadataDocument(documentPath: string, fileName: string): Promise<MetadataOut | null> {
    let text: string;
    try {
        text = await readFile(documentPath, 'utf8');
    } catch {
        return null;
    }

    let parsed: unknown;
    try {
        parsed = YAML.parse(text);
    } catch (error) {
        logger.warn('Metadata document is not valid YAML', {
            documentPath,
            error: error instanceof Error ? error.message : String(error),
        });
        return null;
    }

    const result = metadataDocumentSchema.safeParse(parsed);
    if (!result.success) {
        logger.warn('Metadata document has an unexpected shape', { documentPath });
        return null;
    }

    return result.data.outs.find(out => out.path === fileName) ?? null;
}

/**
 * Render a document in the layout the metadata tool writes
 */
export function renderMetadataDocument(out: { md5: string; size: number; path: string }): string {
    return YAML.stringify(
        { outs: [{ md5: out.md5, size: out.size, hash: 'md5', path: out.path }] },
        { indentSeq: false }
    );
}

/**
 * Keep the data file itself out of git history
 */
export async function ensureGitignoreEntry(dir: string, fileName: string): Promise<boolean> {
    const gitignorePath = join(dir, '.gitignore');
    const entry = `/${fileName}`;

    let current = '';
    try {
        current = await readFile(gitignorePath, 'utf8');
    } catch {
        current = '';
    }

    const lines = current.split(/\r?\n/);
    if (lines.includes(entry)) {
        return false;
    }

    const prefix = current === '' || current.endsWith('\n') ? current : `${current}\n`;
    await writeFile(gitignorePath, `${prefix}${entry}\n`, 'utf8');
    return true;
}

/**
 * Computes the document directly
 */
export class SimulatedMetadataProducer implements MetadataProducer {
    readonly source = 'simulated' as const;

    async produceMetadata(filePath: string): Promise<MetadataResult> {
        const fileName = basename(filePath);
        const documentPath = metadataDocumentPath(filePath);
        const { md5, size } = await computeChecksum(filePath);

        const prior = await readMetadataDocument(documentPath, fileName);
        if (prior && prior.md5 === md5 && prior.size === size) {
            logger.info('Metadata document unchanged', { documentPath, checksum: md5 });
        } else {
            // Whole-document rewrite: a changed checksum replaces the prior entry
            await writeFile(documentPath, renderMetadataDocument({ md5, size, path: fileName }), 'utf8');
            logger.info('Metadata document written', {
                documentPath,
                checksum: md5,
                previousChecksum: prior?.md5 ?? null,
            });
        }

        await ensureGitignoreEntry(dirname(filePath), fileName);

        return { path: fileName, documentPath, checksum: md5, size, source: this.source };
    }
}

/**
 * Delegates to the external metadata tool
 */
export class DvcMetadataProducer implements MetadataProducer {
    readonly source = 'real' as const;

    constructor(
        private readonly runner: CommandRunner,
        private readonly binary: string,
        private readonly timeoutMs: number
    ) {}

    async produceMetadata(filePath: string): Promise<MetadataResult> {
        const dir = dirname(filePath);
        const fileName = basename(filePath);
        const documentPath = metadataDocumentPath(filePath);
        const options = { cwd: dir, timeoutMs: this.timeoutMs };

        const initialized = await stat(join(dir, '.dvc')).then(info => info.isDirectory(), () => false);
        if (!initialized) {
            logger.info('Initializing metadata tool', { dir });
            await runChecked(this.runner, this.binary, ['init'], options);
        }

        logger.info(`Adding ${fileName} to metadata tool`, { dir });
        await runChecked(this.runner, this.binary, ['add', fileName], options);

        const out = await readMetadataDocument(documentPath, fileName);
        if (!out) {
            throw new Error(`Metadata document was not created: ${documentPath}`);
        }

        const size = out.size ?? (await stat(filePath)).size;
        return { path: out.path, documentPath, checksum: out.md5, size, source: this.source };
    }
}

const METADATA_TOOL = 'Metadata tool';

export class MetadataVersioner {
    constructor(
        private readonly probe: AvailabilityProbe,
        private readonly real: MetadataProducer,
        private readonly simulated: MetadataProducer
    ) {}

    /**
     * Probe fresh, then produce metadata through the real tool or the simulated path
     */
    async version(filePath: string): Promise<MetadataVersionOutcome> {
        const info = await stat(filePath).catch(() => null);
        if (!info?.isFile()) {
            throw new Error(`Data file not found: ${filePath}`);
        }
        logger.info('Versioning data file', { filePath, size: info.size });

        const toolAvailability = await this.probe.probe();
        let result: MetadataResult | null = null;
        let unavailable: ToolUnavailableError | null = null;

        if (toolAvailability.externalToolUsable) {
            try {
                result = await this.real.produceMetadata(filePath);
            } catch (error) {
                unavailable = new ToolUnavailableError(METADATA_TOOL, error instanceof Error ? error.message : String(error));
                logger.warn('Metadata tool failed at runtime, using simulated path', { error: unavailable.message });
            }
        } else {
            unavailable = new ToolUnavailableError(METADATA_TOOL, toolAvailability.reason ?? 'unknown');
            logger.info('Metadata tool not usable, using simulated path', { error: unavailable.message });
        }

        if (!result) {
            result = await this.simulated.produceMetadata(filePath);
        }

        metadataVersionsTotal.inc({ source: result.source });
        logger.info('Metadata produced', {
            documentPath: result.documentPath,
            checksum: result.checksum,
            source: result.source,
        });

        if (unavailable) {
            return { ...result, toolAvailability, fallbackReason: unavailable.message };
        }
        return { ...result, toolAvailability };
    }
}
