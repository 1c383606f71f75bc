import { EDPOPREC } from '../rdf/namespaces.js';
import { Field, type Subfield } from './field.js';

export class DigitizationField extends Field {
    protected override readonly rdfClass = EDPOPREC('DigitizationField');

    url: string | null = null;
    iiifManifest: string | null = null;

    protected override subfields(): Subfield[] {
        return [
            ...super.subfields(),
            { name: 'url', predicate: EDPOPREC('url'), datatype: 'string', value: () => this.url },
            { name: 'iiif_manifest', predicate: EDPOPREC('iiifManifest'), datatype: 'uriref', value: () => this.iiifManifest },
        ];
    }
}
