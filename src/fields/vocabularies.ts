import { readFileSync } from 'node:fs';
import { z } from 'zod';

const languageSchema = z.object({
    pt3: z.string().length(3),
    pt2b: z.string().length(3),
    pt1: z.string().length(2).nullable(),
    name: z.string(),
});

export type Language = z.infer<typeof languageSchema>;

const relatorsSchema = z.record(z.string(), z.string());

function readDataFile(filename: string): unknown {
    const url = new URL(`../../data/${filename}`, import.meta.url);
    return JSON.parse(readFileSync(url, 'utf-8'));
}

let languages: Language[] | null = null;
let relators: Record<string, string> | null = null;

function getLanguages(): Language[] {
    if (!languages) {
        languages = z.array(languageSchema).parse(readDataFile('languages.json'));
    }
    return languages;
}

function getRelators(): Record<string, string> {
    if (!relators) {
        relators = relatorsSchema.parse(readDataFile('relators.json'));
    }
    return relators;
}

/**
 * Find a language by its English name or by one of its ISO 639 codes
 * (639-1, 639-2/B or 639-3), ignoring case and surrounding whitespace.
 */
export function findLanguage(value: string): Language | null {
    const needle = value.trim().toLowerCase();
    if (!needle) return null;
    return getLanguages().find((language) =>
        language.pt3 === needle ||
        language.pt2b === needle ||
        language.pt1 === needle ||
        language.name.toLowerCase() === needle
    ) ?? null;
}

/**
 * English label of a relator code such as `aut` or `prt`.
 */
export function relatorLabel(code: string): string | null {
    return getRelators()[code] ?? null;
}
