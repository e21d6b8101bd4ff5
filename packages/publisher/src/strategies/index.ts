export { attemptUpload, fileForm, type UploadResult, type UploadStrategy } from './strategy.js';
export { GofileStrategy, type GofileOptions } from './gofile.js';
export { PlainTextHostStrategy, type PlainTextHostOptions } from './plain-host.js';
export { DriveStrategy, driveFileUrl, type DriveOptions } from './drive.js';
