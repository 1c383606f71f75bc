export {
    CatalogRecord,
    RawData,
    RecordError,
    type FieldRegistryEntry,
    type FieldType,
    type RecordData,
    type RecordLoader,
} from './record.js';
export { BibliographicalRecord } from './bibliographical-record.js';
export { BiographicalRecord } from './biographical-record.js';
