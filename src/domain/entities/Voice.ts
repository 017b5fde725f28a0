import { ProviderName } from './Capability';

export type VoiceGender = 'male' | 'female' | 'neutral';

export type QualityTier = 'standard' | 'neural' | 'premium';

/**
 * Voice as described by a provider, mapped to the canonical shape.
 */
export interface VoiceDescriptor {
    readonly id: string;
    readonly name: string;
    readonly provider: ProviderName;
    /** BCP-47 tags */
    readonly languages: readonly string[];
    readonly gender: VoiceGender;
    /** Category and use-case tags (e.g. `cloned`, `narration`, `conversational`) */
    readonly tags: readonly string[];
    readonly qualityTier: QualityTier;
    readonly description?: string;
    readonly previewUrl?: string;
    readonly sampleRate?: number;
}

export interface VoiceFilter {
    /** Matches a voice language by prefix, so `en` matches `en-US` and `en-GB` */
    language?: string;
    gender?: VoiceGender;
    qualityTier?: QualityTier;
    tag?: string;
}

/**
 * Audio sample used to clone a voice.
 */
export interface VoiceSample {
    fileName: string;
    data: Buffer;
    contentType?: string;
}

export function matchesVoiceFilter(voice: VoiceDescriptor, filter?: VoiceFilter): boolean {
    if (!filter) return true;

    if (filter.language) {
        const wanted = filter.language.toLowerCase();
        const match = voice.languages.some(language => language.toLowerCase().startsWith(wanted));
        if (!match) return false;
    }
    if (filter.gender && voice.gender !== filter.gender) return false;
    if (filter.qualityTier && voice.qualityTier !== filter.qualityTier) return false;
    if (filter.tag) {
        const wanted = filter.tag.toLowerCase();
        if (!voice.tags.some(tag => tag.toLowerCase() === wanted)) return false;
    }
    return true;
}

/**
 * Case-insensitive match of a free-text query against name, description and tags.
 */
export function matchesVoiceQuery(voice: VoiceDescriptor, query: string): boolean {
    const needle = query.trim().toLowerCase();
    if (!needle) return true;

    const haystack = [voice.name, voice.description ?? '', ...voice.tags, voice.id];
    return haystack.some(field => field.toLowerCase().includes(needle));
}

export function toGender(value: string | undefined): VoiceGender {
    const normalized = (value ?? '').toLowerCase();
    if (normalized === 'male') return 'male';
    if (normalized === 'female') return 'female';
    return 'neutral';
}
