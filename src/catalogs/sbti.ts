import { z } from 'zod';
import { DatingField } from '../fields/dating-field.js';
import { Field } from '../fields/field.js';
import { LocationField } from '../fields/location-field.js';
import { CerlReader, type CerlRow } from '../readers/cerl-reader.js';
import { ReaderError } from '../readers/reader.js';
import { BiographicalRecord } from '../records/biographical-record.js';
import { ReaderType } from '../types/index.js';

const nameSchema = z
    .object({
        name: z.string().optional(),
        firstname: z.string().optional(),
    })
    .passthrough();

export const sbtiRowSchema = z
    .object({
        heading: z.array(nameSchema).optional(),
        variantName: z.array(nameSchema).optional(),
        // Misspelled in the API
        placeOfActitivty: z.array(z.object({ name: z.string().optional() }).passthrough()).optional(),
        activityDates: z.array(z.object({ text: z.union([z.string(), z.number()]) }).passthrough()).optional(),
        activity: z.array(z.string()).optional(),
    })
    .passthrough();

type SbtiName = z.infer<typeof nameSchema>;

/**
 * Full name from a heading or variant name: first name and surname, or
 * the surname alone.
 */
export function nameField(name: SbtiName): Field | null {
    if (name.firstname && name.name) {
        return new Field(`${name.firstname} ${name.name}`);
    }
    return name.name ? new Field(name.name) : null;
}

/**
 * The Scottish Book Trade Index on data.cerl.org.
 */
export class SbtiReader extends CerlReader {
    static override READERTYPE = ReaderType.BIOGRAPHICAL;
    static override CATALOG_URIREF = 'https://edpop.hum.uu.nl/readers/sbti';
    static override IRI_PREFIX = 'https://edpop.hum.uu.nl/readers/sbti/';
    static override SHORT_NAME = 'Scottish Book Trade Index (SBTI)';
    static override DESCRIPTION =
        'An index of the names, trades and addresses of people involved in printing in Scotland up to 1850';

    protected readonly apiUrl = 'https://data.cerl.org/sbti/_search';
    protected readonly linkBaseUrl = 'https://data.cerl.org/sbti/';

    protected convertRecord(row: CerlRow): BiographicalRecord {
        const parsed = sbtiRowSchema.safeParse(row);
        if (!parsed.success) {
            throw new ReaderError(`Unexpected SBTI record: ${parsed.error.issues[0]?.message ?? 'invalid structure'}`);
        }
        const raw = parsed.data;

        const record = new BiographicalRecord(SbtiReader);
        record.data = row;
        record.identifier = this.rowIdentifier(row);
        if (record.identifier) {
            record.link = this.linkBaseUrl + record.identifier;
        }

        const heading = raw.heading?.[0];
        if (heading) {
            record.name = nameField(heading);
        }
        if (raw.variantName) {
            record.variantNames = raw.variantName
                .map(nameField)
                .filter((field): field is Field => field !== null);
        }
        if (raw.placeOfActitivty) {
            record.placesOfActivity = raw.placeOfActitivty.flatMap((place) => {
                if (!place.name) return [];
                const field = new LocationField(place.name);
                field.locationType = LocationField.LOCALITY;
                return [field];
            });
        }
        if (raw.activityDates && raw.activityDates.length > 0) {
            const text = raw.activityDates.map((dates) => String(dates.text)).join(', ');
            record.activityTimespan = new DatingField(text);
            record.activityTimespan.normalize();
        }
        if (raw.activity) {
            record.activities = raw.activity.map((activity) => new Field(activity));
        }

        return record;
    }
}
