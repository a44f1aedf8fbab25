import type {
    ClassGraph,
    ClassHandle,
    LoadedOntology,
    QualifiedClassName,
} from '../types/ontology.js';
import { silentLogger } from '../types/ontology.js';
import type { ExtractOptions } from '../types/options.js';
import { createUnresolvedOntologyError } from '../types/errors.js';

/**
 * `prefix-LocalName` for a class, using the prefix of the ontology owning it.
 */
export function qualifiedName(
    cls: ClassHandle,
    prefixes: ReadonlyMap<string, string>
): QualifiedClassName {
    const ontologyName = cls.owningOntology().canonicalName();
    const prefix = prefixes.get(ontologyName);
    if (prefix === undefined) {
        throw createUnresolvedOntologyError(ontologyName, cls.iri());
    }
    return `${prefix}-${cls.localName()}`;
}

/**
 * Direct named superclasses; restrictions and anonymous expressions are skipped.
 */
function parentNames(
    cls: ClassHandle,
    prefixes: ReadonlyMap<string, string>
): Set<QualifiedClassName> {
    const parents = new Set<QualifiedClassName>();
    for (const expression of cls.directSuperclasses()) {
        if (expression.kind === 'namedClass') {
            parents.add(qualifiedName(expression.cls, prefixes));
        }
    }
    return parents;
}

/**
 * Builds the merged class graph: qualified name -> direct parents.
 *
 * A qualified name seen a second time keeps its first parent set unless
 * `mergeDuplicates` is set, in which case the parents are unioned.
 */
export function extractClassGraph(
    ontologies: readonly LoadedOntology[],
    prefixes: ReadonlyMap<string, string>,
    options: ExtractOptions = {}
): ClassGraph {
    const logger = options.logger ?? silentLogger;
    const graph: ClassGraph = new Map();

    for (const ontology of ontologies) {
        for (const cls of ontology.handle.classes()) {
            const key = qualifiedName(cls, prefixes);
            const parents = parentNames(cls, prefixes);
            const existing = graph.get(key);
            if (!existing) {
                graph.set(key, parents);
                continue;
            }
            if (options.mergeDuplicates) {
                parents.forEach(p => existing.add(p));
            } else {
                logger.warn(`Duplicate type ${key} in ${ontology.name}; keeping its first parent set`);
            }
        }
    }

    return graph;
}
