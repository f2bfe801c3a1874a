export { HeadlessElement, HeadlessVideoElement } from './HeadlessElement.js';
export { HeadlessCanvas, HeadlessCanvasContext2D } from './HeadlessCanvas.js';
export { HeadlessImageData } from './HeadlessImageData.js';
export { HeadlessRenderSurface } from './HeadlessRenderSurface.js';
export { DocumentRenderSurface, type DocumentLike } from './DocumentRenderSurface.js';
