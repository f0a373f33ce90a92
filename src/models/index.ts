export * from './example.js';
export * from './feedback.js';
export * from './field-schema.js';
export * from './field-value.js';
export * from './ports.js';
