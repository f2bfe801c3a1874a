/**
 * Utility exports
 */

export {
  Logger,
  createLogger,
  setDebugMode,
  isDebugMode,
  setLogSink,
  type LogLevel,
  type LogEntry,
  type LogSink,
} from './logger.js';

export {
  validateNonNegativeInteger,
  validateUint32,
  validateNotClosed,
} from './validation.js';

export {
  isImageDataLike,
  isDrawingSurface,
  isDrawingContext2D,
  isPresentationElement,
  isFrameProvider,
  type FrameProvider,
} from './type-guards.js';

export { toUint8Array } from './buffer.js';
