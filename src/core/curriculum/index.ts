/**
 * Curriculum Module - Barrel Export
 */

export {
  parseNewsletterCsv,
  parseCurriculumDate,
  parseCsvRecords,
  expandTwoDigitYear,
  type ParsedNewsletter,
  type SkippedRow,
} from './newsletter-parser';
export {
  CurriculumImporter,
  type CurriculumStore,
  type StudentLookup,
  type ImportNewsletterInput,
  type ImportNewsletterResult,
  type ImportNewsletterCsvInput,
  type ImportNewsletterCsvResult,
} from './curriculum-importer';
