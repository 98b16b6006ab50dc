import { Registry, Counter, Histogram, Gauge, collectDefaultMetrics } from 'prom-client';
import { IMetricsPort, MetricTags } from '../../domain/ports/IMetricsPort';

export interface PrometheusMetricsOptions {
    /** Prefix for every metric name (default: 'avatar_stream_') */
    prefix?: string;
    /** Collect process/runtime metrics as well (default: true) */
    collectDefaults?: boolean;
}

/**
 * Prometheus Metrics Adapter
 *
 * Implements IMetricsPort using prom-client; scraped through GET /metrics.
 */
export class PrometheusMetricsAdapter implements IMetricsPort {
    private readonly registry: Registry;
    private readonly prefix: string;
    private counters: Map<string, Counter<string>> = new Map();
    private histograms: Map<string, Histogram<string>> = new Map();
    private gauges: Map<string, Gauge<string>> = new Map();

    constructor(options?: PrometheusMetricsOptions) {
        this.prefix = options?.prefix ?? 'avatar_stream_';
        this.registry = new Registry();
        this.registry.setDefaultLabels({ app: 'avatar-stream-server' });

        if (options?.collectDefaults ?? true) {
            collectDefaultMetrics({ register: this.registry, prefix: this.prefix });
        }
    }

    /**
     * Increments a counter.
     */
    incrementCounter(name: string, tags?: MetricTags, value: number = 1): void {
        const metricName = this.sanitizeName(name);
        let counter = this.counters.get(metricName);

        if (!counter) {
            counter = new Counter({
                name: metricName,
                help: `Total count of ${name}`,
                labelNames: tags ? Object.keys(tags) : [],
                registers: [this.registry],
            });
            this.counters.set(metricName, counter);
        }

        if (tags) {
            counter.inc(this.stringifyTags(tags), value);
        } else {
            counter.inc(value);
        }
    }

    /**
     * Records a duration in milliseconds.
     */
    recordDuration(name: string, durationMs: number, tags?: MetricTags): void {
        const metricName = this.sanitizeName(name);
        let histogram = this.histograms.get(metricName);

        if (!histogram) {
            histogram = new Histogram({
                name: metricName,
                help: `Distribution of ${name}`,
                labelNames: tags ? Object.keys(tags) : [],
                buckets: [250, 1000, 5000, 15000, 30000, 60000, 120000, 300000],
                registers: [this.registry],
            });
            this.histograms.set(metricName, histogram);
        }

        if (tags) {
            histogram.observe(this.stringifyTags(tags), durationMs);
        } else {
            histogram.observe(durationMs);
        }
    }

    /**
     * Records a gauge value.
     */
    recordGauge(name: string, value: number, tags?: MetricTags): void {
        const metricName = this.sanitizeName(name);
        let gauge = this.gauges.get(metricName);

        if (!gauge) {
            gauge = new Gauge({
                name: metricName,
                help: `Current value of ${name}`,
                labelNames: tags ? Object.keys(tags) : [],
                registers: [this.registry],
            });
            this.gauges.set(metricName, gauge);
        }

        if (tags) {
            gauge.set(this.stringifyTags(tags), value);
        } else {
            gauge.set(value);
        }
    }

    startTimer(name: string, tags?: MetricTags): () => void {
        const startTime = Date.now();
        return () => {
            this.recordDuration(name, Date.now() - startTime, tags);
        };
    }

    /**
     * Gets the Prometheus-formatted metrics string.
     */
    async getMetrics(): Promise<string> {
        return this.registry.metrics();
    }

    get contentType(): string {
        return this.registry.contentType;
    }

    /**
     * Prometheus names allow [a-zA-Z0-9_:] only.
     */
    private sanitizeName(name: string): string {
        return `${this.prefix}${name}`.replace(/[^a-zA-Z0-9_:]/g, '_');
    }

    private stringifyTags(tags: MetricTags): Record<string, string> {
        const result: Record<string, string> = {};
        for (const [key, value] of Object.entries(tags)) {
            result[key] = String(value);
        }
        return result;
    }
}
