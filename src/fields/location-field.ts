import { EDPOPREC } from '../rdf/namespaces.js';
import { Field, type Subfield } from './field.js';

/**
 * A place, such as a place of publication or of activity.
 */
export class LocationField extends Field {
    static readonly LOCALITY = EDPOPREC('locality').value;
    static readonly COUNTRY = EDPOPREC('country').value;

    protected override readonly rdfClass = EDPOPREC('LocationField');

    /** Either `LocationField.LOCALITY` or `LocationField.COUNTRY` */
    locationType: string | null = null;

    protected override subfields(): Subfield[] {
        return [
            ...super.subfields(),
            { name: 'location_type', predicate: EDPOPREC('locationType'), datatype: 'uriref', value: () => this.locationType },
        ];
    }
}
