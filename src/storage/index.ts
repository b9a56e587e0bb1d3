/**
 * Storage Layer
 *
 * @module storage
 */

export { atomicWriteFile } from './atomic.js';

export {
  DATA_DIR_ENV,
  resolveDataDir,
  getDataDir,
  getSnapshotsDir,
  getControlsPath,
} from './paths.js';

export {
  CsvSnapshotWriter,
  isoWeekStamp,
  safeCityName,
  formatCsvField,
  formatCsv,
  type SnapshotWriter,
  type CsvSnapshotWriterOptions,
} from './snapshot.js';
