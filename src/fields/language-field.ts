import { EDPOPREC } from '../rdf/namespaces.js';
import { Field, type NormalizationResult, type Subfield } from './field.js';
import { normalizeByLanguageCode } from './normalizers.js';
import { findLanguage } from './vocabularies.js';

/**
 * A language of a work, normalized to an ISO 639-3 code.
 */
export class LanguageField extends Field {
    protected override readonly rdfClass = EDPOPREC('LanguageField');

    languageCode: string | null = null;

    override get summaryText(): string | null {
        if (this.languageCode === null) return null;
        return findLanguage(this.languageCode)?.name ?? null;
    }

    override normalize(): NormalizationResult {
        return normalizeByLanguageCode(this);
    }

    protected override subfields(): Subfield[] {
        return [
            ...super.subfields(),
            { name: 'language_code', predicate: EDPOPREC('languageCode'), datatype: 'string', value: () => this.languageCode },
        ];
    }
}
