import { collectDefaultMetrics, Counter, exponentialBuckets, Gauge, Histogram, Registry } from 'prom-client';
import { IMetricsPort, isMetricName, METRIC_HELP, METRICS, MetricTags } from '../../domain/ports/IMetricsPort';

export interface PrometheusMetricsOptions {
    /** Prefix for process metrics (default: 'tts_gateway_') */
    prefix?: string;
    /** Collect Node.js process metrics as well (default: true) */
    collectDefaults?: boolean;
    registry?: Registry;
}

const DURATION_BUCKETS_MS = [10, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000];
// 1 KiB up to 16 MiB
const AUDIO_BYTE_BUCKETS = exponentialBuckets(1024, 4, 8);

interface Family<M> {
    metric: M;
    labelNames: string[];
}

interface FamilyConfig {
    name: string;
    help: string;
    labelNames: string[];
    registers: Registry[];
}

/**
 * Exposes gateway observations through a prom-client registry.
 *
 * Dotted names become underscored (`tts.attempts_total` -> `tts_attempts_total`).
 * A family's label names are fixed by its first observation; tags outside
 * that set are dropped on later observations.
 */
export class PrometheusMetricsAdapter implements IMetricsPort {
    private readonly registry: Registry;
    private readonly counters = new Map<string, Family<Counter<string>>>();
    private readonly gauges = new Map<string, Family<Gauge<string>>>();
    private readonly histograms = new Map<string, Family<Histogram<string>>>();

    constructor(options: PrometheusMetricsOptions = {}) {
        this.registry = options.registry ?? new Registry();
        this.registry.setDefaultLabels({ app: 'tts-gateway' });

        if (options.collectDefaults ?? true) {
            collectDefaultMetrics({ register: this.registry, prefix: options.prefix ?? 'tts_gateway_' });
        }
    }

    incrementCounter(name: string, tags?: MetricTags, value: number = 1): void {
        const family = this.family(this.counters, name, tags, config => new Counter(config));
        family.metric.inc(labels(family, tags), value);
    }

    recordDuration(name: string, durationMs: number, tags?: MetricTags): void {
        this.recordHistogram(name, durationMs, tags);
    }

    recordGauge(name: string, value: number, tags?: MetricTags): void {
        const family = this.family(this.gauges, name, tags, config => new Gauge(config));
        family.metric.set(labels(family, tags), value);
    }

    recordHistogram(name: string, value: number, tags?: MetricTags): void {
        const buckets = name === METRICS.AUDIO_BYTES ? AUDIO_BYTE_BUCKETS : DURATION_BUCKETS_MS;
        const family = this.family(this.histograms, name, tags, config => new Histogram({ ...config, buckets }));
        family.metric.observe(labels(family, tags), value);
    }

    /** Prometheus exposition text for a scrape endpoint. */
    async getMetrics(): Promise<string> {
        return this.registry.metrics();
    }

    private family<M>(
        store: Map<string, Family<M>>,
        name: string,
        tags: MetricTags | undefined,
        create: (config: FamilyConfig) => M
    ): Family<M> {
        const metricName = name.replace(/\./g, '_');
        const existing = store.get(metricName);
        if (existing) return existing;

        const labelNames = tags ? Object.keys(tags) : [];
        const family = {
            metric: create({
                name: metricName,
                help: isMetricName(name) ? METRIC_HELP[name] : name,
                labelNames,
                registers: [this.registry],
            }),
            labelNames,
        };
        store.set(metricName, family);
        return family;
    }
}

function labels<M>(family: Family<M>, tags: MetricTags = {}): Record<string, string> {
    const result: Record<string, string> = {};
    for (const key of family.labelNames) {
        if (key in tags) {
            result[key] = String(tags[key]);
        }
    }
    return result;
}
