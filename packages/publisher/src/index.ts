export { Publisher } from './publisher.js';
export { UploadError } from './errors.js';
export * from './strategies/index.js';
