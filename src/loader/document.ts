import fs from 'fs/promises';
import path from 'path';
import { fileURLToPath, pathToFileURL } from 'url';
import { Parser } from 'n3';
import { RdfXmlParser } from 'rdfxml-streaming-parser';
import type { Quad } from '@rdfjs/types';

export type DocumentFormat = 'rdfxml' | 'turtle' | 'ntriples' | 'n3';

const FORMAT_BY_EXTENSION: Record<string, DocumentFormat> = {
    '.owl': 'rdfxml',
    '.rdf': 'rdfxml',
    '.xml': 'rdfxml',
    '.ttl': 'turtle',
    '.nt': 'ntriples',
    '.n3': 'n3',
};

const N3_FORMATS: Record<Exclude<DocumentFormat, 'rdfxml'>, string> = {
    turtle: 'text/turtle',
    ntriples: 'application/n-triples',
    n3: 'text/n3',
};

export interface RdfDocument {
    /** Absolute URI the document was read from; base for relative IRIs. */
    uri: string;
    quads: Quad[];
}

export function isRemote(location: string): boolean {
    return /^https?:\/\//i.test(location);
}

/**
 * Normalizes a path or URI to an absolute URI.
 */
export function toDocumentUri(location: string): string {
    if (isRemote(location) || location.startsWith('file:')) {
        return location;
    }
    return pathToFileURL(path.resolve(location)).href;
}

/**
 * Picks the parser from the extension, falling back to sniffing the content.
 */
export function detectFormat(uri: string, content: string): DocumentFormat {
    const pathname = uri.replace(/[?#].*$/, '');
    const format = FORMAT_BY_EXTENSION[path.posix.extname(pathname).toLowerCase()];
    if (format) {
        return format;
    }
    return content.trimStart().startsWith('<') ? 'rdfxml' : 'turtle';
}

async function readContent(uri: string): Promise<string> {
    if (isRemote(uri)) {
        const response = await fetch(uri, { headers: { accept: 'application/rdf+xml, text/turtle;q=0.9, */*;q=0.5' } });
        if (!response.ok) {
            throw new Error(`HTTP ${response.status} ${response.statusText}`);
        }
        return response.text();
    }
    return fs.readFile(fileURLToPath(uri), 'utf-8');
}

function parseRdfXml(content: string, baseIRI: string): Promise<Quad[]> {
    return new Promise((resolve, reject) => {
        const quads: Quad[] = [];
        const parser = new RdfXmlParser({ baseIRI });
        parser.on('data', (quad: Quad) => quads.push(quad));
        parser.on('error', reject);
        parser.on('end', () => resolve(quads));
        parser.write(content);
        parser.end();
    });
}

export async function parseDocument(
    content: string,
    uri: string,
    format: DocumentFormat = detectFormat(uri, content)
): Promise<Quad[]> {
    if (format === 'rdfxml') {
        return parseRdfXml(content, uri);
    }
    return new Parser({ baseIRI: uri, format: N3_FORMATS[format] }).parse(content);
}

/**
 * Reads and parses the document at `location` (path, file URI or URL).
 */
export async function readDocument(location: string): Promise<RdfDocument> {
    const uri = toDocumentUri(location);
    const content = await readContent(uri);
    return { uri, quads: await parseDocument(content, uri) };
}
