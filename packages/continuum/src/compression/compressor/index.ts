export * from './base.js';
export * from './video.js';
export * from './image.js';
export * from './audio.js';
export * from './library.js';
export * from './data.js';
