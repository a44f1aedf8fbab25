// === Ontology model ===

/**
 * A user-supplied ontology reference. `location` is a `file://` URI or an
 * http(s) URL; `prefix` is the explicit short name, if one was given.
 */
export interface OntologySource {
    readonly location: string;
    readonly prefix?: string;
}

/**
 * One entry of a class's `rdfs:subClassOf` list. Only `namedClass` entries
 * take part in the merged hierarchy.
 */
export type SuperclassExpression =
    | { kind: 'namedClass'; cls: ClassHandle }
    | { kind: 'restriction'; property?: string }
    | { kind: 'anonymousClass' };

export interface ClassHandle {
    localName(): string;
    iri(): string;
    owningOntology(): OntologyHandle;
    directSuperclasses(): readonly SuperclassExpression[];
}

export interface OntologyHandle {
    canonicalName(): string;
    baseIdentifier(): string;
    /** Classes declared in this ontology, in declaration order. */
    classes(): readonly ClassHandle[];
    /** Depth-first import closure, without the ontology itself. */
    transitivelyImportedOntologies(): readonly OntologyHandle[];
}

/**
 * Loads an ontology together with everything it imports.
 */
export interface OntologyLoader {
    load(location: string): Promise<OntologyHandle>;
}

export interface LoadedOntology {
    readonly handle: OntologyHandle;
    readonly name: string;
    readonly prefix: string;
}

export interface ResolvedOntologies {
    ontologies: LoadedOntology[];
    /** canonical ontology name -> prefix */
    prefixes: Map<string, string>;
}

/** `prefix-LocalName` */
export type QualifiedClassName = string;

/**
 * Qualified class name -> direct parents. Insertion order is output order.
 */
export type ClassGraph = Map<QualifiedClassName, Set<QualifiedClassName>>;

export interface Logger {
    info(message: string): void;
    warn(message: string): void;
}

export const silentLogger: Logger = {
    info: () => undefined,
    warn: () => undefined,
};
