export { FileSourceTextProvider, sidecarPath } from './file-source.js';
export { JsonTemplateSchemaProvider } from './json-template.js';
