export type { DeviceDescriptor, FrameSource, FrameSourceHandle } from './types.js';
export { FrameSourceStream, FrameSourceTrack } from './FrameSourceStream.js';
export { FrameSourceMediaDevices } from './FrameSourceMediaDevices.js';
