import { ProviderName } from './Capability';
import { AudioConfig, VoiceSettings } from './Synthesis';
import { TtsError } from './TtsError';

/**
 * Session lifecycle:
 *   created -> active -> finishing -> closed
 * errored and cancelled are reachable from any non-terminal state.
 */
export type SessionState = 'created' | 'active' | 'finishing' | 'closed' | 'errored' | 'cancelled';

export type SessionEvent = 'TEXT_ACCEPTED' | 'FINISH_REQUESTED' | 'DRAINED' | 'FAILED' | 'CANCELLED';

const TERMINAL_STATES: ReadonlySet<SessionState> = new Set<SessionState>(['closed', 'errored', 'cancelled']);

export function isTerminalState(state: SessionState): boolean {
    return TERMINAL_STATES.has(state);
}

/**
 * Pure transition function for streaming sessions.
 * @throws TtsError (Internal) on a transition the lifecycle does not allow
 */
export function transitionSession(state: SessionState, event: SessionEvent): SessionState {
    switch (event) {
        case 'TEXT_ACCEPTED':
            if (state === 'created' || state === 'active') return 'active';
            break;
        case 'FINISH_REQUESTED':
            if (state === 'created' || state === 'active') return 'finishing';
            break;
        case 'DRAINED':
            if (state === 'finishing') return 'closed';
            break;
        case 'FAILED':
            if (!isTerminalState(state)) return 'errored';
            break;
        case 'CANCELLED':
            if (!isTerminalState(state)) return 'cancelled';
            break;
    }
    throw new TtsError('Internal', 'gateway', `Invalid session transition: ${event} in state ${state}`, {
        code: 'invalid_transition',
    });
}

export interface StreamOptions {
    voiceId: string;
    language?: string;
    voiceSettings?: VoiceSettings;
    audioConfig?: Partial<AudioConfig>;
}

export interface StreamSessionStatus {
    handle: string;
    provider: ProviderName;
    state: SessionState;
    pendingChunks: number;
    deliveredChunks: number;
    audioBytes: number;
    createdAt: Date;
    error?: TtsError;
}
