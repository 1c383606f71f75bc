import { NormalizationResult } from './field.js';
import { findLanguage } from './vocabularies.js';

// ─── Language ─────────────────────────────────────────────

/**
 * Resolve a language name in English or one of the ISO 639 codes to an
 * ISO 639-3 code.
 */
export function normalizeByLanguageCode(
    field: { readonly originalText: string; languageCode: string | null }
): NormalizationResult {
    if (!field.originalText.trim()) {
        return NormalizationResult.NO_DATA;
    }
    const language = findLanguage(field.originalText);
    if (!language) {
        return NormalizationResult.FAIL;
    }
    field.languageCode = language.pt3;
    return NormalizationResult.SUCCESS;
}

// ─── Contributor ──────────────────────────────────────────

export function normalizeContributorName(
    field: { readonly originalText: string; name: string | null }
): NormalizationResult {
    const name = field.originalText.trim().replace(/\s+/g, ' ');
    if (!name) {
        return NormalizationResult.NO_DATA;
    }
    field.name = name;
    return NormalizationResult.SUCCESS;
}

// ─── Dating ───────────────────────────────────────────────

const EDTF_PATTERNS: Array<[RegExp, (match: RegExpMatchArray) => string]> = [
    [/^(\d{4})$/, (m) => `${m[1]}`],
    [/^(\d{4})\?$/, (m) => `${m[1]}?`],
    [/^(?:ca\.?|c\.|circa)\s*(\d{4})$/i, (m) => `${m[1]}~`],
    [/^(\d{4})\s*[-–]\s*(\d{4})$/, (m) => `${m[1]}/${m[2]}`],
    [/^(\d{3})-$/, (m) => `${m[1]}X`],
];

/**
 * Translate the common ways catalogs write an (approximate) year of
 * publication into an EDTF date: `1650`, `1650?`, `ca. 1650` (`1650~`),
 * `1650-1660` (`1650/1660`) and `165-` (`165X`). Surrounding square
 * brackets and a final period are ignored.
 */
export function normalizeEdtfDating(
    field: { readonly originalText: string; edtfDate: string | null }
): NormalizationResult {
    const text = field.originalText
        .trim()
        .replace(/\.$/, '')
        .replace(/^\[(.*)\]$/, '$1')
        .trim();
    if (!text) {
        return NormalizationResult.NO_DATA;
    }
    for (const [pattern, format] of EDTF_PATTERNS) {
        const match = text.match(pattern);
        if (match) {
            field.edtfDate = format(match);
            return NormalizationResult.SUCCESS;
        }
    }
    return NormalizationResult.FAIL;
}
