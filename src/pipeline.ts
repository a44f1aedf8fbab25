import type { OntologySource } from './types/ontology.js';
import { silentLogger } from './types/ontology.js';
import type { FlattenOptions } from './types/options.js';
import { PrefixRegistry } from './prefix/allocator.js';
import { resolveImportClosure } from './ontology/resolver.js';
import { extractClassGraph } from './ontology/extractor.js';
import { excludeRoot } from './ontology/filter.js';
import { serializeTypes } from './serializer/typesXml.js';

/**
 * Loads the sources with their imports, merges all classes into one
 * prefixed hierarchy and renders the types document.
 *
 * Each call allocates prefixes from a fresh registry.
 */
export async function flattenOntologies(
    sources: readonly OntologySource[],
    options: FlattenOptions
): Promise<string> {
    const logger = options.logger ?? silentLogger;
    const registry = new PrefixRegistry();

    const { ontologies, prefixes } = await resolveImportClosure(sources, options.loader, registry, logger);
    let graph = extractClassGraph(ontologies, prefixes, {
        mergeDuplicates: options.mergeDuplicates,
        logger,
    });
    if (options.excludeRoot) {
        graph = excludeRoot(graph);
    }

    logger.info(`Writing ${graph.size} types from ${ontologies.length} ontologies`);
    return serializeTypes(graph, ontologies.map(o => o.handle));
}
