import { v4 as uuidv4 } from 'uuid';
import { ProviderName } from '../domain/entities/Capability';
import { AudioFormat, describeSynthesis, StreamResult } from '../domain/entities/Synthesis';
import {
    isTerminalState,
    SessionState,
    StreamOptions,
    StreamSessionStatus,
    transitionSession,
} from '../domain/entities/StreamingSession';
import { TtsError } from '../domain/entities/TtsError';
import { IMetricsPort, METRICS, NoOpMetricsAdapter } from '../domain/ports/IMetricsPort';
import { ITtsProviderAdapter } from '../domain/ports/ITtsProviderAdapter';
import { CapabilityRegistry } from './CapabilityRegistry';
import { ResilienceEngine } from './ResilienceEngine';

interface SessionRecord {
    handle: string;
    provider: ProviderName;
    adapter: ITtsProviderAdapter;
    streamId: string;
    format: AudioFormat;
    state: SessionState;
    /** Accepted chunks not yet acknowledged, in submission order */
    pending: string[];
    deliveredChunks: number;
    deliveredText: string[];
    audio: Buffer[];
    /** Index into `audio` of the first chunk not yet returned by readAudio */
    readIndex: number;
    terminalError?: TtsError;
    controller: AbortController;
    /** Set once the vendor stream has been aborted */
    released: boolean;
    /** Single-writer chain: every adapter call for this session runs after the previous one */
    tail: Promise<void>;
    createdAt: Date;
}

export interface StreamingSessionManagerOptions {
    metrics?: IMetricsPort;
}

/**
 * Owns all live streaming sessions, keyed by opaque handle.
 *
 * Operations on one handle are serialized through that session's chain;
 * operations on different handles never wait on each other.
 */
export class StreamingSessionManager {
    private readonly sessions = new Map<string, SessionRecord>();
    private readonly metrics: IMetricsPort;

    constructor(
        private readonly engine: ResilienceEngine,
        private readonly registry: CapabilityRegistry,
        options: StreamingSessionManagerOptions = {}
    ) {
        this.metrics = options.metrics ?? new NoOpMetricsAdapter();
    }

    /**
     * Opens a vendor stream and registers a session in `created`.
     * @returns Opaque session handle
     */
    async open(adapter: ITtsProviderAdapter, options: StreamOptions): Promise<string> {
        this.registry.requireFeature(adapter.provider, 'streaming', 'startStream');

        const controller = new AbortController();
        const streamId = await this.engine.execute(
            {
                provider: adapter.provider,
                operation: 'startStream',
                run: ctx => adapter.startStream(options, ctx),
            },
            { signal: controller.signal }
        );

        const handle = `stream_${uuidv4()}`;
        this.sessions.set(handle, {
            handle,
            provider: adapter.provider,
            adapter,
            streamId,
            format: options.audioConfig?.format ?? 'pcm',
            state: 'created',
            pending: [],
            deliveredChunks: 0,
            deliveredText: [],
            audio: [],
            readIndex: 0,
            controller,
            released: false,
            tail: Promise.resolve(),
            createdAt: new Date(),
        });

        this.metrics.incrementCounter(METRICS.STREAMS_OPENED, { provider: adapter.provider });
        this.metrics.recordGauge(METRICS.ACTIVE_STREAMS, this.sessions.size);
        console.log(`[StreamingSession] Opened ${handle} on ${adapter.provider}`);
        return handle;
    }

    /**
     * Accepts a text chunk. The chunk joins the session's queue at call time, so concurrent
     * pushes reach the provider in the order they were made. Resolves when the provider
     * acknowledged this chunk.
     */
    async pushText(handle: string, text: string): Promise<void> {
        if (!text || !text.trim()) {
            throw new TtsError('InvalidInput', 'gateway', 'Text chunk must not be empty');
        }

        const session = this.requireSession(handle);
        if (session.state !== 'created' && session.state !== 'active') {
            throw new TtsError('Internal', session.provider, `Session ${handle} is ${session.state} and cannot accept text`, {
                code: 'invalid_session_state',
            });
        }

        session.state = transitionSession(session.state, 'TEXT_ACCEPTED');
        session.pending.push(text);

        return this.enqueue(session, async () => {
            if (this.isStopped(session)) {
                throw new TtsError('Internal', session.provider, `Session ${handle} is ${session.state}; chunk was not delivered`, {
                    code: 'invalid_session_state',
                });
            }

            const outcome = await this.engine.run(
                {
                    provider: session.provider,
                    operation: 'pushText',
                    run: ctx => session.adapter.pushText(session.streamId, text, ctx),
                },
                { signal: session.controller.signal }
            );

            if (session.state === 'cancelled') {
                console.warn(`[StreamingSession] Discarding acknowledgement for cancelled ${handle}`);
                throw new TtsError('Internal', session.provider, `Session ${handle} was cancelled`, { code: 'cancelled' });
            }

            if (!outcome.ok) {
                await this.fail(session, outcome.error);
                throw outcome.error;
            }

            session.pending.shift();
            session.deliveredChunks++;
            session.deliveredText.push(text);
            this.appendAudio(session, outcome.value);
        });
    }

    /**
     * Drains accepted chunks, signals end of input and closes the session.
     * On an errored session resolves with the partial audio and `complete: false`.
     */
    async finish(handle: string): Promise<StreamResult> {
        const session = this.requireSession(handle);

        if (session.state === 'errored') {
            this.remove(session);
            return this.buildResult(session, false);
        }
        if (session.state !== 'created' && session.state !== 'active') {
            throw new TtsError('Internal', session.provider, `Session ${handle} is ${session.state} and cannot be finished`, {
                code: 'invalid_session_state',
            });
        }

        session.state = transitionSession(session.state, 'FINISH_REQUESTED');

        return this.enqueue(session, async () => {
            if (this.isStopped(session)) {
                this.remove(session);
                return this.buildResult(session, false);
            }

            const outcome = await this.engine.run(
                {
                    provider: session.provider,
                    operation: 'finishStream',
                    run: ctx => session.adapter.finishStream(session.streamId, ctx),
                },
                { signal: session.controller.signal }
            );

            if (session.state === 'cancelled') {
                return this.buildResult(session, false);
            }
            if (!outcome.ok) {
                await this.fail(session, outcome.error);
                this.remove(session);
                return this.buildResult(session, false);
            }

            this.appendAudio(session, outcome.value);
            session.state = transitionSession(session.state, 'DRAINED');
            this.remove(session);
            console.log(`[StreamingSession] Closed ${handle} after ${session.deliveredChunks} chunk(s)`);
            return this.buildResult(session, true);
        });
    }

    /**
     * Cancels the session. In-flight calls are aborted and late acknowledgements discarded.
     * @returns The audio received so far, marked incomplete
     */
    async cancel(handle: string): Promise<StreamResult> {
        const session = this.requireSession(handle);

        if (session.state !== 'errored') {
            session.state = transitionSession(session.state, 'CANCELLED');
            session.controller.abort();
        }
        this.remove(session);
        await this.releaseStream(session);

        console.log(`[StreamingSession] Cancelled ${handle}`);
        return this.buildResult(session, false);
    }

    status(handle: string): StreamSessionStatus {
        const session = this.requireSession(handle);
        return {
            handle: session.handle,
            provider: session.provider,
            state: session.state,
            pendingChunks: session.pending.length,
            deliveredChunks: session.deliveredChunks,
            audioBytes: session.audio.reduce((sum, chunk) => sum + chunk.length, 0),
            createdAt: session.createdAt,
            error: session.terminalError,
        };
    }

    /**
     * Returns audio acknowledged since the previous read.
     */
    readAudio(handle: string): Buffer {
        const session = this.requireSession(handle);
        const fresh = session.audio.slice(session.readIndex);
        session.readIndex = session.audio.length;
        return Buffer.concat(fresh);
    }

    activeSessions(): number {
        return this.sessions.size;
    }

    private requireSession(handle: string): SessionRecord {
        const session = this.sessions.get(handle);
        if (!session) {
            throw new TtsError('Internal', 'gateway', `Unknown stream handle: ${handle}`, { code: 'unknown_handle' });
        }
        return session;
    }

    private enqueue<T>(session: SessionRecord, task: () => Promise<T>): Promise<T> {
        const result = session.tail.then(task);
        session.tail = result.then(() => undefined, () => undefined);
        return result;
    }

    private isStopped(session: SessionRecord): boolean {
        return session.state === 'errored' || session.state === 'cancelled';
    }

    /**
     * Moves the session to `errored` and releases the vendor stream. The record stays
     * registered so `finish` can still return the partial audio.
     */
    private async fail(session: SessionRecord, error: TtsError): Promise<void> {
        if (isTerminalState(session.state)) return;
        session.state = transitionSession(session.state, 'FAILED');
        session.terminalError = error;
        console.error(`[StreamingSession] ${session.handle} errored: ${error.kind} - ${error.message}`);
        await this.releaseStream(session);
    }

    // Best effort: the session is over whether or not the vendor accepts the abort
    private async releaseStream(session: SessionRecord): Promise<void> {
        if (session.released || !session.adapter.abortStream) return;
        session.released = true;

        try {
            await session.adapter.abortStream(session.streamId);
        } catch (error) {
            console.warn(`[StreamingSession] abortStream failed for ${session.handle}:`, error);
        }
    }

    private appendAudio(session: SessionRecord, audio: Buffer): void {
        if (audio.length > 0) {
            session.audio.push(audio);
        }
    }

    private remove(session: SessionRecord): void {
        if (this.sessions.delete(session.handle)) {
            this.metrics.incrementCounter(METRICS.STREAMS_CLOSED, { provider: session.provider, state: session.state });
            this.metrics.recordGauge(METRICS.ACTIVE_STREAMS, this.sessions.size);
        }
    }

    private buildResult(session: SessionRecord, complete: boolean): StreamResult {
        const audio = Buffer.concat(session.audio);
        return {
            audio,
            format: session.format,
            complete,
            chunksDelivered: session.deliveredChunks,
            terminalError: session.terminalError,
            metadata: describeSynthesis(session.deliveredText.join(' '), audio),
        };
    }
}
