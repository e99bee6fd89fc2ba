export { RotatingFileWriter, DEFAULT_FILE_MODE, type WriterDependencies } from './rotation/RotatingFileWriter.js';
export { MaintenanceWorker, type MaintenanceResult } from './rotation/MaintenanceWorker.js';
export { createRotatingStream } from './rotation/stream.js';
export {
  RotationError,
  RotationErrorType,
  OversizedWriteError,
  OpenFailureError,
  RotationFailureError,
  CompressionError,
  MaintenanceError,
} from './rotation/errors.js';
export {
  ConfigurationError,
  DEFAULT_MAX_SIZE_MB,
  loadOptionsFromEnvironment,
  resolveRotationConfig,
  type RotationConfig,
  type RotationOptions,
} from './config/rotationConfig.js';
export {
  BACKUP_TIME_FORMAT,
  COMPRESS_SUFFIX,
  backupName,
  parseBackupName,
  type BackupFile,
} from './utils/backupName.js';
export { compressFile } from './utils/compressFile.js';
export { parseSize } from './utils/parseSize.js';
