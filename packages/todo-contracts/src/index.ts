/**
 * @module @taskloop/todo-contracts
 * Types, schemas and errors shared by every taskloop package.
 */

export * from './todo.js';
export * from './feedback.js';
export * from './execution.js';
export * from './session.js';
export * from './loop.js';
export * from './errors.js';
export * from './config-schema.js';
export * from './logger.js';
