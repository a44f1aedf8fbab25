export * from './ontology.js';
export * from './options.js';
export * from './errors.js';
