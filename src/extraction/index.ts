/**
 * Barrel exports for IOC extraction and export.
 */

export {
  createIocSet,
  mergeIocSets,
  toSerializableIocs,
  countIocs,
  extractIocs,
  extractUrlscanIocs,
  extractSilentPushIocs,
  extractIocRows,
  type IocRow,
} from './ioc-extractor.js';

export {
  csvField,
  combinedCsv,
  singleColumnCsv,
  iocJson,
  writeIocFiles,
  type IocExportResult,
} from './ioc-writer.js';
