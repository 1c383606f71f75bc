import { DatingField } from '../fields/dating-field.js';
import { Field } from '../fields/field.js';
import { LocationField } from '../fields/location-field.js';
import { EDPOPREC } from '../rdf/namespaces.js';
import { CatalogRecord, type FieldRegistryEntry } from './record.js';

/**
 * Representation of edpoprec:BiographicalRecord: a person or firm active
 * in the book trade.
 */
export class BiographicalRecord extends CatalogRecord {
    name: Field | null = null;
    variantNames: Field[] | null = null;
    placeOfBirth: LocationField | null = null;
    placeOfDeath: LocationField | null = null;
    placesOfActivity: LocationField[] | null = null;
    activityTimespan: DatingField | null = null;
    activities: Field[] | null = null;
    gender: Field | null = null;
    lifespan: DatingField | null = null;
    timespan: DatingField | null = null;

    protected override fields(): FieldRegistryEntry[] {
        return [
            ...super.fields(),
            { name: 'name', predicate: EDPOPREC('name'), fieldType: Field, value: () => this.name },
            { name: 'variantNames', predicate: EDPOPREC('variantName'), fieldType: Field, value: () => this.variantNames },
            { name: 'placeOfBirth', predicate: EDPOPREC('placeOfBirth'), fieldType: LocationField, value: () => this.placeOfBirth },
            { name: 'placeOfDeath', predicate: EDPOPREC('placeOfDeath'), fieldType: LocationField, value: () => this.placeOfDeath },
            { name: 'placesOfActivity', predicate: EDPOPREC('placeOfActivity'), fieldType: LocationField, value: () => this.placesOfActivity },
            { name: 'activityTimespan', predicate: EDPOPREC('activityTimespan'), fieldType: DatingField, value: () => this.activityTimespan },
            { name: 'activities', predicate: EDPOPREC('activity'), fieldType: Field, value: () => this.activities },
            { name: 'gender', predicate: EDPOPREC('gender'), fieldType: Field, value: () => this.gender },
            { name: 'lifespan', predicate: EDPOPREC('lifespan'), fieldType: DatingField, value: () => this.lifespan },
            { name: 'timespan', predicate: EDPOPREC('timespan'), fieldType: DatingField, value: () => this.timespan },
        ];
    }

    override toString(): string {
        return this.name ? this.name.toString() : super.toString();
    }
}
