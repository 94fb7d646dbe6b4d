/**
 * Prometheus metrics for the APOD pipeline
 */
import client from 'prom-client';

// Create a Registry
export const registry = new client.Registry();

// Add default metrics (process CPU, memory, etc.)
client.collectDefaultMetrics({ register: registry });

// ============================================================================
// PIPELINE METRICS
// ============================================================================

/**
 * Counter: Pipeline runs by final status
 */
export const pipelineRunsTotal = new client.Counter({
    name: 'apod_pipeline_runs_total',
    help: 'Total number of pipeline runs',
    labelNames: ['status'] as const,
    registers: [registry],
});

/**
 * Histogram: Stage duration in seconds
 */
export const stageDuration = new client.Histogram({
    name: 'apod_pipeline_stage_duration_seconds',
    help: 'Pipeline stage duration in seconds',
    labelNames: ['stage'] as const,
    buckets: [0.01, 0.05, 0.1, 0.5, 1, 5, 15, 30, 60, 180],
    registers: [registry],
});

// ============================================================================
// EXTRACTION METRICS
// ============================================================================

/**
 * Counter: Upstream attempts by classification
 */
export const extractionAttemptsTotal = new client.Counter({
    name: 'apod_extraction_attempts_total',
    help: 'Upstream API attempts by classification',
    labelNames: ['result'] as const,
    registers: [registry],
});

/**
 * Counter: Extraction outcomes by provenance (live, cached, placeholder)
 */
export const extractionOutcomesTotal = new client.Counter({
    name: 'apod_extraction_outcomes_total',
    help: 'Extraction outcomes by provenance',
    labelNames: ['provenance'] as const,
    registers: [registry],
});

// ============================================================================
// SINK & VERIFICATION METRICS
// ============================================================================

/**
 * Counter: Sink writes by sink and status
 */
export const sinkWritesTotal = new client.Counter({
    name: 'apod_sink_writes_total',
    help: 'Sink write operations',
    labelNames: ['sink', 'status'] as const,
    registers: [registry],
});

/**
 * Counter: Verification results
 */
export const verificationTotal = new client.Counter({
    name: 'apod_verification_total',
    help: 'Dual-write verification results',
    labelNames: ['result'] as const,
    registers: [registry],
});

// ============================================================================
// VERSIONING METRICS
// ============================================================================

/**
 * Counter: Metadata documents produced by source (real, simulated)
 */
export const metadataVersionsTotal = new client.Counter({
    name: 'apod_metadata_versions_total',
    help: 'Metadata documents produced by source',
    labelNames: ['source'] as const,
    registers: [registry],
});

/**
 * Counter: Commit attempts by result (committed, clean, failed)
 */
export const commitsTotal = new client.Counter({
    name: 'apod_commits_total',
    help: 'Repository reconcile results',
    labelNames: ['result'] as const,
    registers: [registry],
});

/**
 * Counter: Publish attempts by reason code
 */
export const publishTotal = new client.Counter({
    name: 'apod_publish_total',
    help: 'Publish attempts by reason code',
    labelNames: ['reason'] as const,
    registers: [registry],
});

// ============================================================================
// QUEUE METRICS
// ============================================================================

/**
 * Counter: Total jobs processed by queue and status
 */
export const jobsTotal = new client.Counter({
    name: 'apod_jobs_total',
    help: 'Total number of jobs processed',
    labelNames: ['queue', 'status'] as const,
    registers: [registry],
});

/**
 * Gauge: Current queue depth by queue name
 */
export const queueDepth = new client.Gauge({
    name: 'apod_queue_depth',
    help: 'Current number of jobs in queue',
    labelNames: ['queue'] as const,
    registers: [registry],
});

/**
 * Gauge: DLQ size
 */
export const dlqSize = new client.Gauge({
    name: 'apod_dlq_size',
    help: 'Number of jobs in dead letter queue',
    registers: [registry],
});

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Get metrics as Prometheus text format
 */
export async function getMetrics(): Promise<string> {
    return registry.metrics();
}

/**
 * Get content type for Prometheus
 */
export function getContentType(): string {
    return registry.contentType;
}

/**
 * Time an async stage and record its duration
 */
export async function timeStage<T>(stage: string, fn: () => Promise<T>): Promise<T> {
    const end = stageDuration.startTimer({ stage });
    try {
        return await fn();
    } finally {
        end();
    }
}
