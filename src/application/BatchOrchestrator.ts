import { v4 as uuidv4 } from 'uuid';
import { RetryPolicy } from '../domain/entities/RetryPolicy';
import { SynthesisRequest, SynthesisResult } from '../domain/entities/Synthesis';
import { TtsError } from '../domain/entities/TtsError';
import { IMetricsPort, METRICS, NoOpMetricsAdapter } from '../domain/ports/IMetricsPort';
import { ITtsProviderAdapter } from '../domain/ports/ITtsProviderAdapter';
import { ExecutionOutcome, ResilienceEngine } from './ResilienceEngine';

export type BatchItemResult = ExecutionOutcome<SynthesisResult> & { index: number };

export interface BatchOptions {
    /** Maximum in-flight adapter calls (default: orchestrator default) */
    concurrency?: number;
    policy?: RetryPolicy;
    /** Returns an error to reject an item without calling the adapter */
    guard?: (request: SynthesisRequest, index: number) => TtsError | undefined;
    onProgress?: (completed: number, total: number, item: BatchItemResult) => void;
}

export interface BatchOrchestratorOptions {
    /** Default concurrency, 1 = sequential */
    concurrency?: number;
    metrics?: IMetricsPort;
}

/**
 * Simple semaphore for concurrency control.
 */
class Semaphore {
    private permits: number;
    private waiting: Array<() => void> = [];

    constructor(permits: number) {
        this.permits = permits;
    }

    async acquire(): Promise<void> {
        if (this.permits > 0) {
            this.permits--;
            return;
        }
        return new Promise(resolve => {
            this.waiting.push(resolve);
        });
    }

    release(): void {
        const next = this.waiting.shift();
        if (next) {
            next();
        } else {
            this.permits++;
        }
    }
}

/**
 * Fans a list of synthesis requests out to one adapter.
 * Each item has its own retry budget; one item failing never affects the others.
 * result[i] always corresponds to request[i].
 */
export class BatchOrchestrator {
    private readonly defaultConcurrency: number;
    private readonly metrics: IMetricsPort;

    constructor(private readonly engine: ResilienceEngine, options: BatchOrchestratorOptions = {}) {
        this.defaultConcurrency = options.concurrency ?? 1;
        this.metrics = options.metrics ?? new NoOpMetricsAdapter();
    }

    async synthesizeBatch(
        adapter: ITtsProviderAdapter,
        requests: readonly SynthesisRequest[],
        options: BatchOptions = {}
    ): Promise<BatchItemResult[]> {
        const concurrency = options.concurrency ?? this.defaultConcurrency;
        if (!Number.isInteger(concurrency) || concurrency < 1) {
            throw new TtsError('InvalidInput', 'gateway', `Batch concurrency must be an integer >= 1, got ${concurrency}`);
        }

        const batchId = `batch_${uuidv4().substring(0, 8)}`;
        const startedAt = Date.now();
        const semaphore = new Semaphore(concurrency);
        let completed = 0;

        console.log(`[Batch] Starting ${batchId} with ${requests.length} item(s) on ${adapter.provider} (concurrency: ${concurrency})`);
        this.metrics.recordGauge(METRICS.BATCH_SIZE, requests.length, { provider: adapter.provider });

        const results = await Promise.all(requests.map(async (request, index): Promise<BatchItemResult> => {
            await semaphore.acquire();
            try {
                const item = await this.processItem(adapter, request, index, options);
                completed++;
                this.reportProgress(options, completed, requests.length, item);
                return item;
            } finally {
                semaphore.release();
            }
        }));

        const failures = results.filter(result => !result.ok).length;
        if (failures > 0) {
            this.metrics.incrementCounter(METRICS.BATCH_FAILURES, { provider: adapter.provider }, failures);
        }
        this.metrics.recordDuration(METRICS.BATCH_DURATION, Date.now() - startedAt, { provider: adapter.provider });
        console.log(`[Batch] ${batchId} complete: ${results.length - failures} succeeded, ${failures} failed`);

        return results;
    }

    private reportProgress(options: BatchOptions, completed: number, total: number, item: BatchItemResult): void {
        try {
            options.onProgress?.(completed, total, item);
        } catch (error) {
            console.warn(`[Batch] Progress callback failed for item ${item.index}:`, error);
        }
    }

    private async processItem(
        adapter: ITtsProviderAdapter,
        request: SynthesisRequest,
        index: number,
        options: BatchOptions
    ): Promise<BatchItemResult> {
        const rejection = options.guard?.(request, index);
        if (rejection) {
            return { ok: false, error: rejection, attempts: 0, index };
        }

        const outcome = await this.engine.run(
            {
                provider: adapter.provider,
                operation: 'synthesizeBatchItem',
                run: ctx => adapter.synthesizeBatchItem(request, ctx),
            },
            { policy: options.policy }
        );

        if (!outcome.ok) {
            console.warn(`[Batch] Item ${index} failed: ${outcome.error.kind} - ${outcome.error.message}`);
        }
        return { ...outcome, index };
    }
}
