/**
 * rofi-calendar
 *
 * Main exports for embedding the pipeline without the CLI.
 */

// Schema types and validation
export * from '../schemas/index.js';

export * from './errors.js';
export * from './config.js';
export * from './time-range.js';
export * from './format.js';
export * from './selection.js';
export * from './pipeline.js';

// Providers
export * from '../providers/index.js';
