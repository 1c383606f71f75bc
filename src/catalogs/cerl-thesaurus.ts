import { z } from 'zod';
import { DatingField } from '../fields/dating-field.js';
import { Field } from '../fields/field.js';
import { LocationField } from '../fields/location-field.js';
import { CerlReader, type CerlRow } from '../readers/cerl-reader.js';
import { BiographicalRecord } from '../records/biographical-record.js';
import { ReaderType } from '../types/index.js';
import { nameField } from './sbti.js';

const nameSchema = z.object({ name: z.string().optional(), firstname: z.string().optional() }).passthrough();

const thesaurusRowSchema = z
    .object({
        heading: z.array(nameSchema).optional(),
        variantName: z.array(nameSchema).optional(),
        placeOfBirth: z.string().optional(),
        placeOfDeath: z.string().optional(),
        dateOfBirth: z.union([z.string(), z.number()]).optional(),
        dateOfDeath: z.union([z.string(), z.number()]).optional(),
        gender: z.string().optional(),
    })
    .passthrough();

function locality(name: string | undefined): LocationField | null {
    if (!name) return null;
    const field = new LocationField(name);
    field.locationType = LocationField.LOCALITY;
    return field;
}

/**
 * The CERL Thesaurus of persons, places and corporate bodies of the
 * hand-press period.
 */
export class CerlThesaurusReader extends CerlReader {
    static override READERTYPE = ReaderType.BIOGRAPHICAL;
    static override CATALOG_URIREF = 'https://edpop.hum.uu.nl/readers/cerlthesaurus';
    static override IRI_PREFIX = 'https://edpop.hum.uu.nl/readers/cerlthesaurus/';
    static override SHORT_NAME = 'CERL Thesaurus';
    static override DESCRIPTION =
        'Forms of names for persons, places and corporate bodies active in the hand-press period';

    protected readonly apiUrl = 'https://data.cerl.org/thesaurus/_search';
    protected readonly linkBaseUrl = 'https://data.cerl.org/thesaurus/';

    protected convertRecord(row: CerlRow): BiographicalRecord {
        const record = new BiographicalRecord(CerlThesaurusReader);
        record.data = row;
        record.identifier = this.rowIdentifier(row);
        if (record.identifier) {
            record.link = this.linkBaseUrl + record.identifier;
        }

        // Rows of other entity types do not follow the person structure
        const parsed = thesaurusRowSchema.safeParse(row);
        if (!parsed.success) {
            return record;
        }
        const raw = parsed.data;

        const heading = raw.heading?.[0];
        if (heading) {
            record.name = nameField(heading);
        }
        if (raw.variantName) {
            record.variantNames = raw.variantName
                .map(nameField)
                .filter((field): field is Field => field !== null);
        }
        record.placeOfBirth = locality(raw.placeOfBirth);
        record.placeOfDeath = locality(raw.placeOfDeath);
        if (raw.dateOfBirth !== undefined || raw.dateOfDeath !== undefined) {
            const text = `${raw.dateOfBirth ?? ''}-${raw.dateOfDeath ?? ''}`;
            record.lifespan = new DatingField(text);
            record.lifespan.normalize();
        }
        if (raw.gender) {
            record.gender = new Field(raw.gender);
        }
        return record;
    }
}
