/**
 * Providers the gateway can dispatch to. The set is closed and chosen at startup.
 */
export const PROVIDERS = ['elevenlabs', 'polly', 'google', 'deepgram'] as const;

export type ProviderName = typeof PROVIDERS[number];

/**
 * Optional features that differ between providers.
 * Core synthesis and voice listing are available everywhere and are not listed.
 */
export const FEATURES = [
    'streaming',
    'voiceCloning',
    'lexicons',
    'ssml',
    'soundEffects',
    'speechMarks',
    'audioProfiles',
] as const;

export type Feature = typeof FEATURES[number];

/**
 * - supported: the operation reaches the vendor
 * - planned-stub: the adapter answers with a deterministic placeholder
 * - unsupported: rejected before any adapter call
 */
export type CapabilityStatus = 'supported' | 'planned-stub' | 'unsupported';

export type CapabilityMatrix = Readonly<Record<Feature, CapabilityStatus>>;

export function isProviderName(value: string): value is ProviderName {
    return PROVIDERS.some(provider => provider === value);
}
