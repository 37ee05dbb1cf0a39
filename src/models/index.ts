/**
 * vorg data models
 *
 * Barrel export for all model interfaces.
 */

export * from './item.js';
export * from './collection.js';
export * from './json.js';
