/**
 * brainmeta type exports.
 */

export * from './exit-codes.js';
export * from './config.js';
export * from './records.js';
export * from './validation.js';
