import { ProviderLimits } from '../ports/ITtsProviderAdapter';
import { SynthesisRequest } from '../entities/Synthesis';

/** Rough speaking rate used for duration estimates: 50ms per character. */
const SECONDS_PER_CHARACTER = 0.05;

/** Warn once the text uses more than this share of the provider limit. */
const LIMIT_WARNING_RATIO = 0.8;

export interface ValidationResult {
    valid: boolean;
    characterCount: number;
    maxCharacters: number;
    estimatedDurationSeconds: number;
    errors: string[];
    warnings: string[];
}

/**
 * Checks a request against the provider's limits without calling the provider.
 */
export function validateSynthesisInput(request: SynthesisRequest, limits: ProviderLimits): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];
    const characterCount = request.text.length;

    if (!request.text.trim()) {
        errors.push('Text is required for TTS');
    }
    if (characterCount > limits.maxCharacters) {
        errors.push(`Text length ${characterCount} exceeds the provider limit of ${limits.maxCharacters} characters`);
    } else if (characterCount > limits.maxCharacters * LIMIT_WARNING_RATIO) {
        warnings.push(`Text length ${characterCount} is close to the provider limit of ${limits.maxCharacters} characters`);
    }

    if (request.textType === 'ssml') {
        const trimmed = request.text.trim();
        if (!trimmed.startsWith('<speak') || !trimmed.endsWith('</speak>')) {
            errors.push('SSML text must be wrapped in a <speak> element');
        }
    }

    return {
        valid: errors.length === 0,
        characterCount,
        maxCharacters: limits.maxCharacters,
        estimatedDurationSeconds: Math.round(characterCount * SECONDS_PER_CHARACTER * 100) / 100,
        errors,
        warnings,
    };
}
