/**
 * RDF Ontology Loader
 *
 * Reads OWL ontologies (RDF/XML, Turtle, N-Triples) and exposes them through
 * the OntologyHandle / ClassHandle interfaces. A loader instance is one
 * "world": every document is read once and imports are resolved eagerly, so
 * all handles it returns are synchronous.
 */
import { existsSync } from 'fs';
import path from 'path';
import { DataFactory, Store } from 'n3';
import type { Quad, Term } from '@rdfjs/types';
import type {
    ClassHandle,
    Logger,
    OntologyHandle,
    OntologyLoader,
    SuperclassExpression,
} from '../types/ontology.js';
import { silentLogger } from '../types/ontology.js';
import type { LoaderOptions } from '../types/options.js';
import { DEFAULTS } from '../types/options.js';
import { createLoadError } from '../types/errors.js';
import { readDocument, toDocumentUri } from './document.js';
import {
    OWL_CLASS,
    OWL_IMPORTS,
    OWL_NS,
    OWL_ON_PROPERTY,
    OWL_ONTOLOGY,
    OWL_RESTRICTION,
    OWL_THING,
    RDF_TYPE,
    RDFS_CLASS,
    RDFS_SUBCLASS_OF,
} from './vocabulary.js';

const { namedNode } = DataFactory;

const IMPORT_EXTENSIONS = ['', '.owl', '.rdf', '.ttl'];

function stripTrailingSeparator(iri: string): string {
    return iri.endsWith('#') || iri.endsWith('/') ? iri.slice(0, -1) : iri;
}

/**
 * Last path segment of an ontology IRI, without a document extension.
 */
export function ontologyNameFromIri(iri: string): string {
    const trimmed = stripTrailingSeparator(iri);
    const segment = trimmed.slice(trimmed.lastIndexOf('/') + 1);
    const extension = path.posix.extname(segment).toLowerCase();
    const known: readonly string[] = DEFAULTS.documentExtensions;
    return known.includes(extension)
        ? segment.slice(0, -extension.length)
        : segment;
}

export function baseIdentifierFromIri(iri: string): string {
    return iri.endsWith('#') || iri.endsWith('/') ? iri : `${iri}#`;
}

export function localNameFromIri(iri: string): string {
    const hash = iri.lastIndexOf('#');
    return hash === -1 ? iri.slice(iri.lastIndexOf('/') + 1) : iri.slice(hash + 1);
}

/**
 * The `owl` namespace itself; owns `owl:Thing`.
 */
class BuiltinOntology implements OntologyHandle {
    canonicalName(): string {
        return DEFAULTS.rootOntologyName;
    }

    baseIdentifier(): string {
        return OWL_NS;
    }

    classes(): readonly ClassHandle[] {
        return [];
    }

    transitivelyImportedOntologies(): readonly OntologyHandle[] {
        return [];
    }
}

class RdfClass implements ClassHandle {
    constructor(
        private readonly classIri: string,
        private readonly world: RdfOntologyLoader,
        private readonly context: RdfOntology
    ) {}

    iri(): string {
        return this.classIri;
    }

    localName(): string {
        return localNameFromIri(this.classIri);
    }

    owningOntology(): OntologyHandle {
        return this.world.ontologyOwning(this.classIri) ?? this.context;
    }

    directSuperclasses(): readonly SuperclassExpression[] {
        return this.context.superclassesOf(this.classIri);
    }
}

export class RdfOntology implements OntologyHandle {
    readonly imports: RdfOntology[] = [];
    private readonly store: Store;
    private classList?: RdfClass[];

    constructor(
        readonly documentUri: string,
        readonly ontologyIri: string,
        private readonly quads: Quad[],
        private readonly world: RdfOntologyLoader
    ) {
        this.store = new Store();
        this.store.addQuads(quads);
    }

    canonicalName(): string {
        return ontologyNameFromIri(this.ontologyIri);
    }

    baseIdentifier(): string {
        return baseIdentifierFromIri(this.ontologyIri);
    }

    declares(iri: string): boolean {
        return this.store.countQuads(namedNode(iri), namedNode(RDF_TYPE), namedNode(OWL_CLASS), null) > 0
            || this.store.countQuads(namedNode(iri), namedNode(RDF_TYPE), namedNode(RDFS_CLASS), null) > 0;
    }

    classes(): readonly ClassHandle[] {
        if (!this.classList) {
            const seen = new Set<string>();
            this.classList = [];
            for (const quad of this.quads) {
                if (quad.subject.termType !== 'NamedNode'
                    || quad.predicate.value !== RDF_TYPE
                    || (quad.object.value !== OWL_CLASS && quad.object.value !== RDFS_CLASS)
                    || seen.has(quad.subject.value)) {
                    continue;
                }
                seen.add(quad.subject.value);
                this.classList.push(new RdfClass(quad.subject.value, this.world, this));
            }
        }
        return this.classList;
    }

    /**
     * Told superclasses of `iri` in this document. A class without a named
     * superclass is a direct subclass of owl:Thing.
     */
    superclassesOf(iri: string): SuperclassExpression[] {
        const expressions = this.store
            .getQuads(namedNode(iri), namedNode(RDFS_SUBCLASS_OF), null, null)
            .map(quad => this.toExpression(quad.object));
        if (!expressions.some(e => e.kind === 'namedClass')) {
            expressions.unshift({ kind: 'namedClass', cls: new RdfClass(OWL_THING, this.world, this) });
        }
        return expressions;
    }

    private toExpression(term: Term): SuperclassExpression {
        if (term.termType === 'NamedNode') {
            return { kind: 'namedClass', cls: new RdfClass(term.value, this.world, this) };
        }
        if (this.store.countQuads(term, namedNode(RDF_TYPE), namedNode(OWL_RESTRICTION), null) > 0) {
            const [onProperty] = this.store.getObjects(term, namedNode(OWL_ON_PROPERTY), null);
            return { kind: 'restriction', property: onProperty?.value };
        }
        return { kind: 'anonymousClass' };
    }

    importIris(): string[] {
        return this.store
            .getObjects(namedNode(this.ontologyIri), namedNode(OWL_IMPORTS), null)
            .filter(term => term.termType === 'NamedNode')
            .map(term => term.value);
    }

    transitivelyImportedOntologies(): readonly OntologyHandle[] {
        const visited = new Set<RdfOntology>([this]);
        const result: RdfOntology[] = [];
        const visit = (ontology: RdfOntology) => {
            for (const imported of ontology.imports) {
                if (visited.has(imported)) {
                    continue;
                }
                visited.add(imported);
                result.push(imported);
                visit(imported);
            }
        };
        visit(this);
        return result;
    }
}

/**
 * Loads ontology documents and their imports. Documents already loaded by
 * this instance are reused, by document URI and by ontology IRI.
 */
export class RdfOntologyLoader implements OntologyLoader {
    private readonly builtin = new BuiltinOntology();
    private readonly byDocument = new Map<string, RdfOntology>();
    private readonly byIri = new Map<string, RdfOntology>();
    private readonly lookupPaths: string[];
    private readonly logger: Logger;

    constructor(options: LoaderOptions = {}) {
        this.lookupPaths = options.lookupPaths ?? [];
        this.logger = options.logger ?? silentLogger;
    }

    async load(location: string): Promise<OntologyHandle> {
        return this.loadDocument(toDocumentUri(location));
    }

    loaded(): RdfOntology[] {
        return Array.from(this.byDocument.values());
    }

    /**
     * The ontology whose base identifier is the longest prefix of `iri`.
     */
    ontologyOwning(iri: string): OntologyHandle | undefined {
        let owner: OntologyHandle | undefined;
        let longest = 0;
        const candidates: OntologyHandle[] = [this.builtin, ...this.byDocument.values()];
        for (const ontology of candidates) {
            const base = ontology.baseIdentifier();
            if (iri.startsWith(base) && base.length > longest) {
                owner = ontology;
                longest = base.length;
            }
        }
        if (owner) {
            return owner;
        }
        return this.loaded().find(ontology => ontology.declares(iri));
    }

    private async loadDocument(uri: string): Promise<RdfOntology> {
        const cached = this.byDocument.get(uri) ?? this.byIri.get(stripTrailingSeparator(uri));
        if (cached) {
            return cached;
        }

        this.logger.info(`Reading ${uri}`);
        let ontology: RdfOntology;
        try {
            const document = await readDocument(uri);
            const [declared] = document.quads.filter(q =>
                q.subject.termType === 'NamedNode'
                && q.predicate.value === RDF_TYPE
                && q.object.value === OWL_ONTOLOGY);
            const iri = declared?.subject.value ?? document.uri;
            ontology = new RdfOntology(document.uri, iri, document.quads, this);
        } catch (e) {
            throw createLoadError(uri, e);
        }

        // Registered before its imports so import cycles terminate.
        this.byDocument.set(uri, ontology);
        this.byIri.set(stripTrailingSeparator(ontology.ontologyIri), ontology);

        for (const importIri of ontology.importIris()) {
            ontology.imports.push(await this.loadImport(importIri, uri));
        }
        return ontology;
    }

    private async loadImport(iri: string, importedBy: string): Promise<RdfOntology> {
        const known = this.byIri.get(stripTrailingSeparator(iri)) ?? this.byDocument.get(iri);
        if (known) {
            return known;
        }
        const location = this.findInLookupPaths(iri) ?? iri;
        this.logger.info(`Resolving import ${iri} of ${importedBy} -> ${location}`);
        return this.loadDocument(toDocumentUri(location));
    }

    private findInLookupPaths(iri: string): string | undefined {
        const name = stripTrailingSeparator(iri).split('/').pop() ?? '';
        if (!name) {
            return undefined;
        }
        for (const dir of this.lookupPaths) {
            for (const extension of IMPORT_EXTENSIONS) {
                const candidate = path.join(dir, `${name}${extension}`);
                if (existsSync(candidate)) {
                    return candidate;
                }
            }
        }
        return undefined;
    }
}
