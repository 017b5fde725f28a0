/**
 * Pronunciation lexicon entry. Either a phoneme (IPA) or a plain alias is given.
 */
export interface LexiconEntry {
    grapheme: string;
    phoneme?: string;
    alias?: string;
}

export interface LexiconInfo {
    name: string;
    language: string;
    entryCount: number;
    stub?: true;
}

/**
 * Device profile a provider can optimize its output for.
 */
export interface AudioProfile {
    id: string;
    description: string;
    stub?: true;
}
