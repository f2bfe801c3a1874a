export { CameraInfo, type CameraInfoInit } from './CameraInfo.js';
export { requestPermission, queryCameras, querySupportedConstraints } from './queries.js';
