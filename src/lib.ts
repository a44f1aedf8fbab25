/**
 * owl2types - Library Entry Point
 *
 * Exports the conversion pipeline and its stages for use in other projects.
 * This file should NOT import the CLI.
 */

// Pipeline
export { flattenOntologies } from './pipeline.js';

// Stages
export { PrefixRegistry, derivePrefixCandidate } from './prefix/allocator.js';
export { resolveImportClosure } from './ontology/resolver.js';
export { extractClassGraph, qualifiedName } from './ontology/extractor.js';
export { excludeRoot } from './ontology/filter.js';
export { serializeTypes, escapeAttribute, GENERATED_NOTICE } from './serializer/typesXml.js';

// Sources
export { createOntologySource, normalizeLocation, parseOntologyArgument } from './ontology/source.js';

// Loading
export { RdfOntologyLoader, RdfOntology } from './loader/rdfLoader.js';
export { readDocument, parseDocument } from './loader/document.js';

// Types, constants and errors
export * from './types/index.js';
