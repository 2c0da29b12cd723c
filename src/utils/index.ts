export { errorCode, isNotFound } from './fs-errors.js';
export { scanStagingDirectory, type StagedFileInfo } from './directory-scanner.js';
