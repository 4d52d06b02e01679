export * from './bytes.js';
export * from './lines.js';
export * from './json.js';
