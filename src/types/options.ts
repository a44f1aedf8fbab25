import type { Logger, OntologyLoader } from './ontology.js';

export interface ExtractOptions {
    /**
     * Union the parents of a qualified name seen more than once instead of
     * keeping the first parent set.
     */
    mergeDuplicates?: boolean;
    logger?: Logger;
}

export interface FlattenOptions extends ExtractOptions {
    loader: OntologyLoader;
    excludeRoot?: boolean;
}

export interface LoaderOptions {
    lookupPaths?: string[];
    logger?: Logger;
}

export const DEFAULTS = {
    rootOntologyName: 'owl',
    rootClassName: 'owl-Thing',
    containerName: 'core',
    xsiNamespace: 'http://www.w3.org/2001/XMLSchema-instance',
    schemaLocation: 'https://raw.githubusercontent.com/OpenCCG/openccg/master/grammars/types.xsd',
    indent: '    ',
    documentExtensions: ['.owl', '.rdf', '.xml', '.ttl', '.nt', '.n3'],
    lookupPathEnv: 'OWL2TYPES_LOOKUP_PATH',
} as const;
