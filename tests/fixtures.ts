/**
 * In-memory ontologies for testing the pipeline without touching disk.
 */
import type {
    ClassHandle,
    OntologyHandle,
    OntologyLoader,
    SuperclassExpression,
} from '../src/types/ontology.js';
import { createLoadError } from '../src/types/errors.js';

/** `'onto:Class'` for a named class, or a non-class expression. */
export type ParentSpec = string | { kind: 'restriction'; property?: string } | { kind: 'anonymousClass' };

export interface OntologySpec {
    location?: string;
    base?: string;
    classes?: Record<string, ParentSpec[]>;
    imports?: string[];
    /** Report only direct imports, like a loader with a shallow view. */
    shallowImports?: boolean;
}

class FakeClass implements ClassHandle {
    constructor(
        private readonly world: FakeWorld,
        private readonly ontologyName: string,
        private readonly name: string,
        private readonly parents: ParentSpec[]
    ) {}

    localName(): string {
        return this.name;
    }

    iri(): string {
        return `${this.world.ontology(this.ontologyName).baseIdentifier()}${this.name}`;
    }

    owningOntology(): OntologyHandle {
        return this.world.ontology(this.ontologyName);
    }

    directSuperclasses(): readonly SuperclassExpression[] {
        return this.parents.map((parent): SuperclassExpression => {
            if (typeof parent !== 'string') {
                return parent;
            }
            const [ontologyName, className] = parent.split(':');
            return { kind: 'namedClass', cls: new FakeClass(this.world, ontologyName, className, []) };
        });
    }
}

class FakeOntology implements OntologyHandle {
    constructor(
        private readonly world: FakeWorld,
        private readonly name: string,
        private readonly spec: OntologySpec
    ) {}

    canonicalName(): string {
        return this.name;
    }

    baseIdentifier(): string {
        return this.spec.base ?? `http://example.org/${this.name}#`;
    }

    classes(): readonly ClassHandle[] {
        return Object.entries(this.spec.classes ?? {})
            .map(([name, parents]) => new FakeClass(this.world, this.name, name, parents));
    }

    transitivelyImportedOntologies(): readonly OntologyHandle[] {
        if (this.spec.shallowImports) {
            return (this.spec.imports ?? []).map(name => this.world.ontology(name));
        }
        const seen = new Set<string>([this.name]);
        const result: OntologyHandle[] = [];
        const visit = (name: string) => {
            for (const imported of this.world.spec(name).imports ?? []) {
                if (seen.has(imported)) {
                    continue;
                }
                seen.add(imported);
                result.push(this.world.ontology(imported));
                visit(imported);
            }
        };
        visit(this.name);
        return result;
    }
}

/**
 * A set of named ontologies, loadable by their `location`
 * (default `file:///data/<name>.owl`).
 */
export class FakeWorld implements OntologyLoader {
    readonly loads: string[] = [];
    private readonly specs = new Map<string, OntologySpec>();
    private readonly handles = new Map<string, FakeOntology>();

    constructor() {
        this.define('owl', { base: 'http://www.w3.org/2002/07/owl#' });
    }

    define(name: string, spec: OntologySpec = {}): this {
        this.specs.set(name, spec);
        this.handles.set(name, new FakeOntology(this, name, spec));
        return this;
    }

    spec(name: string): OntologySpec {
        const spec = this.specs.get(name);
        if (!spec) {
            throw new Error(`Undefined test ontology ${name}`);
        }
        return spec;
    }

    ontology(name: string): OntologyHandle {
        const handle = this.handles.get(name);
        if (!handle) {
            throw new Error(`Undefined test ontology ${name}`);
        }
        return handle;
    }

    static locationOf(name: string): string {
        return `file:///data/${name}.owl`;
    }

    async load(location: string): Promise<OntologyHandle> {
        for (const [name, spec] of this.specs) {
            if ((spec.location ?? FakeWorld.locationOf(name)) === location) {
                this.loads.push(location);
                return this.ontology(name);
            }
        }
        throw createLoadError(location, new Error('no such test ontology'));
    }
}
