import type { ClassGraph, QualifiedClassName } from '../types/ontology.js';
import { DEFAULTS } from '../types/options.js';

/**
 * Returns a copy of `graph` without the universal root type: its own entry
 * is dropped and it is removed from every parent set. The input is not
 * modified.
 */
export function excludeRoot(
    graph: ClassGraph,
    root: QualifiedClassName = DEFAULTS.rootClassName
): ClassGraph {
    const result: ClassGraph = new Map();
    for (const [name, parents] of graph) {
        if (name === root) {
            continue;
        }
        const kept = new Set(parents);
        kept.delete(root);
        result.set(name, kept);
    }
    return result;
}
