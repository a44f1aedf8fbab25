/**
 * Types document writer
 *
 * Renders a class graph as an OpenCCG `types.xml` document. The layout is
 * fixed: XML declaration, two provenance comments, then the `types`
 * container with one `type` element per graph entry, indented by four
 * spaces, self-closing tags written as `" />`.
 */
import type { ClassGraph, OntologyHandle } from '../types/ontology.js';
import { DEFAULTS } from '../types/options.js';

export const GENERATED_NOTICE =
    '<!-- This file was generated automatically. Do not modify it manually. -->';

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

/**
 * Escape a value for use inside a double-quoted attribute
 */
export function escapeAttribute(value: string): string {
    return value
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/"/g, '&quot;')
        .replace(/>/g, '&gt;');
}

function attributes(pairs: Array<[string, string]>): string {
    return pairs.map(([name, value]) => ` ${name}="${escapeAttribute(value)}"`).join('');
}

/**
 * Comment listing the base identifier of every ontology, one per line
 */
export function ontologiesComment(ontologies: readonly OntologyHandle[]): string {
    const indent = DEFAULTS.indent;
    const identifiers = ontologies.map(o => o.baseIdentifier());
    return `<!-- Ontologies used:\n${indent}${identifiers.join(`\n${indent}`)}\n-->`;
}

/**
 * Serialize the graph. Parents are written in stored order, space separated;
 * entries without parents get no `parents` attribute.
 */
export function serializeTypes(
    graph: ClassGraph,
    ontologies: readonly OntologyHandle[]
): string {
    const container = attributes([
        ['name', DEFAULTS.containerName],
        ['xmlns:xsi', DEFAULTS.xsiNamespace],
        ['xsi:noNamespaceSchemaLocation', DEFAULTS.schemaLocation],
    ]);

    const lines: string[] = [XML_DECLARATION, GENERATED_NOTICE, ontologiesComment(ontologies)];

    if (graph.size === 0) {
        lines.push(`<types${container} />`);
        return lines.join('\n');
    }

    lines.push(`<types${container}>`);
    for (const [name, parents] of graph) {
        const pairs: Array<[string, string]> = [['name', name]];
        if (parents.size > 0) {
            pairs.push(['parents', Array.from(parents).join(' ')]);
        }
        lines.push(`${DEFAULTS.indent}<type${attributes(pairs)} />`);
    }
    lines.push('</types>');

    return lines.join('\n');
}
