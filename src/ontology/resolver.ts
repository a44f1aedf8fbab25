import type {
    LoadedOntology,
    Logger,
    OntologyLoader,
    OntologySource,
    ResolvedOntologies,
} from '../types/ontology.js';
import { silentLogger } from '../types/ontology.js';
import { DEFAULTS } from '../types/options.js';
import { PrefixRegistry } from '../prefix/allocator.js';

/**
 * Loads the given ontologies and everything they import, assigning each a
 * unique prefix.
 *
 * Explicit sources come first, in input order; imported ontologies follow
 * in discovery order. Loader failures propagate unchanged.
 */
export async function resolveImportClosure(
    sources: readonly OntologySource[],
    loader: OntologyLoader,
    registry: PrefixRegistry,
    logger: Logger = silentLogger
): Promise<ResolvedOntologies> {
    const prefixes = new Map<string, string>([
        [DEFAULTS.rootOntologyName, DEFAULTS.rootOntologyName],
    ]);
    const ontologies: LoadedOntology[] = [];

    for (const source of sources) {
        const handle = await loader.load(source.location);
        const prefix = source.prefix !== undefined
            ? registry.allocate(source.prefix)
            : registry.derive(source.location);
        const name = handle.canonicalName();
        prefixes.set(name, prefix);
        ontologies.push({ handle, name, prefix });
        logger.info(`Loaded ${name} as '${prefix}' from ${source.location}`);
    }

    // The list grows while it is walked, so imports of imports are visited too.
    for (let i = 0; i < ontologies.length; i++) {
        for (const imported of ontologies[i].handle.transitivelyImportedOntologies()) {
            const name = imported.canonicalName();
            if (prefixes.has(name)) {
                continue;
            }
            const prefix = registry.derive(name);
            prefixes.set(name, prefix);
            ontologies.push({ handle: imported, name, prefix });
            logger.info(`Imported ${name} as '${prefix}' (via ${ontologies[i].name})`);
        }
    }

    return { ontologies, prefixes };
}
