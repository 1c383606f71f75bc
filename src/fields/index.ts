export { DATATYPES, Field, FieldError, NormalizationResult, type Subfield } from './field.js';
export { LanguageField } from './language-field.js';
export { ContributorField } from './contributor-field.js';
export { LocationField } from './location-field.js';
export { DatingField } from './dating-field.js';
export { DigitizationField } from './digitization-field.js';
export { normalizeByLanguageCode, normalizeContributorName, normalizeEdtfDating } from './normalizers.js';
export { findLanguage, relatorLabel, type Language } from './vocabularies.js';
