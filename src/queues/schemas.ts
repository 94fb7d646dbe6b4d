/**
 * Queue job type definitions
 */

/**
 * Pipeline Job - one end-to-end run of the APOD pipeline
 */
export interface PipelineJob {
    triggeredBy: 'schedule' | 'manual';
    triggeredAt: string;
    requestedBy?: string;
}

/**
 * Summary kept as the job's return value
 */
export interface PipelineJobSummary {
    runId: string;
    date: string;
    provenance: string;
    verificationPassed: boolean;
    metadataSource: string;
    commitHash: string | null;
    madeNewCommit: boolean;
    publishReason: string;
    durationMs: number;
}

/**
 * DLQ Job - failed job moved to dead letter queue
 */
export interface DLQJob {
    originalQueue: string;
    originalJobId: string;
    originalJobData: unknown;
    failureReason: string;
    failedAt: string;
    attemptsMade: number;
}

// Queue names
export const QUEUE_NAMES = {
    PIPELINE: 'apod-pipeline',
    DLQ: 'apod-pipeline-dlq',
} as const;

export type QueueName = typeof QUEUE_NAMES[keyof typeof QUEUE_NAMES];

// Repeatable job id; one schedule, one run in flight
export const SCHEDULED_JOB_ID = 'apod-daily-run';
