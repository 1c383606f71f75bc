import { EDPOPREC } from '../rdf/namespaces.js';
import { Field, type NormalizationResult, type Subfield } from './field.js';
import { normalizeEdtfDating } from './normalizers.js';

/**
 * A date or period, normalized to the Extended Date/Time Format.
 */
export class DatingField extends Field {
    protected override readonly rdfClass = EDPOPREC('DatingField');

    edtfDate: string | null = null;

    override normalize(): NormalizationResult {
        return normalizeEdtfDating(this);
    }

    protected override subfields(): Subfield[] {
        return [
            ...super.subfields(),
            { name: 'edtf_date', predicate: EDPOPREC('edtfDate'), datatype: 'edtf', value: () => this.edtfDate },
        ];
    }
}
