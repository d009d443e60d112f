/**
 * scratchpay core
 *
 * Record types, the error taxonomy, id generation, logging and the payload builder.
 */

export * from './types/index.js';
export * from './errors/index.js';
export * from './ids/index.js';
export * from './logger/index.js';
export * from './payload/index.js';
