/**
 * Metrics Port Interface
 *
 * Contract for observability of the generation pipeline.
 * Implementations: PrometheusMetricsAdapter
 */

export interface MetricTags {
    [key: string]: string | number | boolean;
}

export interface IMetricsPort {
    /**
     * Increment a counter metric.
     * @param name - Metric name (e.g., 'generation.jobs_completed')
     * @param value - Increment amount (default: 1)
     */
    incrementCounter(name: string, tags?: MetricTags, value?: number): void;

    /**
     * Record a duration/timing metric in milliseconds.
     */
    recordDuration(name: string, durationMs: number, tags?: MetricTags): void;

    /**
     * Record a gauge metric (current value at a point in time).
     */
    recordGauge(name: string, value: number, tags?: MetricTags): void;

    /**
     * Start a timer and return a function to stop it.
     */
    startTimer(name: string, tags?: MetricTags): () => void;
}

/**
 * Metric names used by the coordinator, the registry and the transports.
 */
export const METRICS = {
    // Counters
    JOBS_SUBMITTED: 'generation.jobs_submitted',
    JOBS_COMPLETED: 'generation.jobs_completed',
    JOBS_FAILED: 'generation.jobs_failed',
    JOBS_CANCELLED: 'generation.jobs_cancelled',
    AVATARS_PREPARED: 'avatar.preparations_completed',
    AVATARS_PREPARE_FAILED: 'avatar.preparations_failed',
    AVATARS_DEGRADED: 'avatar.degraded_total',
    STREAM_CONNECTIONS: 'stream.connections_total',

    // Durations
    JOB_DURATION: 'generation.job_duration_ms',
    PREPARE_DURATION: 'avatar.prepare_duration_ms',

    // Gauges
    QUEUED_JOBS: 'generation.queued_jobs',
    ACTIVE_JOBS: 'generation.active_jobs',
    OPEN_SESSIONS: 'stream.open_sessions',
} as const;
