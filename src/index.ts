export * from './functionSchema';
export { type LibraryConfig, loadLibraryConfig } from './config/libraryConfig';
export { logger } from './o11y/logger';
