/**
 * Research feed and improvement loop
 */

export * from './types.js';
export * from './feed.js';
export * from './service.js';
