import { IMetricsPort, MetricTags } from '../../domain/ports/IMetricsPort';

export interface ConsoleMetricsOptions {
    /** Prepended to every name with a dot */
    prefix?: string;
    enabled?: boolean;
}

type ObservationType = 'counter' | 'duration' | 'gauge' | 'histogram';

/**
 * Writes each observation as one `[Metrics] {json}` line on stdout.
 */
export class ConsoleMetricsAdapter implements IMetricsPort {
    private readonly prefix: string;
    private readonly enabled: boolean;

    constructor(options: ConsoleMetricsOptions = {}) {
        this.prefix = options.prefix ? `${options.prefix}.` : '';
        this.enabled = options.enabled ?? true;
    }

    incrementCounter(name: string, tags?: MetricTags, value: number = 1): void {
        this.write('counter', name, value, tags);
    }

    recordDuration(name: string, durationMs: number, tags?: MetricTags): void {
        this.write('duration', name, durationMs, tags);
    }

    recordGauge(name: string, value: number, tags?: MetricTags): void {
        this.write('gauge', name, value, tags);
    }

    recordHistogram(name: string, value: number, tags?: MetricTags): void {
        this.write('histogram', name, value, tags);
    }

    private write(type: ObservationType, name: string, value: number, tags: MetricTags = {}): void {
        if (!this.enabled) return;

        const line = JSON.stringify({
            type,
            name: this.prefix + name,
            value,
            tags,
            timestamp: new Date().toISOString(),
        });
        console.log(`[Metrics] ${line}`);
    }
}
