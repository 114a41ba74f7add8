/**
 * Barrel exports for classification and normalization.
 */

export { classify, isRawRecord, scoreFields } from './classifier.js';
export {
  normalizeRecord,
  genericRecord,
  messageRecord,
  summarizeSsl,
  summarizeGeoIp,
  NOT_AVAILABLE,
} from './normalizer.js';
export {
  TemplateRegistry,
  DEFAULT_PLATFORM_TEMPLATES,
  DEFAULT_DATA_TYPE_TEMPLATES,
} from './template-registry.js';
export {
  extractRecords,
  NO_RECORDS_MESSAGE,
  NO_RECORD_LIST_MESSAGE,
  UNEXPECTED_ENVELOPE_MESSAGE,
  UNRECOGNIZED_FORMAT_MESSAGE,
  type RecordExtraction,
} from './envelope.js';
