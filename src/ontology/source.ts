import path from 'path';
import { pathToFileURL } from 'url';
import type { OntologySource } from '../types/ontology.js';
import { createConfigurationError } from '../types/errors.js';

const URL_SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;

export function hasUrlScheme(location: string): boolean {
    return URL_SCHEME.test(location);
}

/**
 * Decodes each run of `%XX` escapes; a run that is not valid UTF-8 is kept as written.
 */
function percentDecode(location: string): string {
    return location.replace(/(?:%[0-9a-f]{2})+/gi, escapes => {
        try {
            return decodeURIComponent(escapes);
        } catch {
            return escapes;
        }
    });
}

/**
 * `http` locations are percent-decoded, URIs with any other scheme are kept
 * as given; anything else is treated as a local path and turned into an
 * absolute `file://` URI.
 */
export function normalizeLocation(location: string): string {
    if (location.startsWith('http')) {
        return percentDecode(location);
    }
    if (hasUrlScheme(location)) {
        return location;
    }
    return pathToFileURL(path.resolve(location)).href;
}

export function createOntologySource(location: string, prefix?: string): OntologySource {
    if (!location) {
        throw createConfigurationError('Ontology location must not be empty', location);
    }
    if (prefix !== undefined && prefix.length === 0) {
        throw createConfigurationError(
            `Empty prefix in '${location}:'`,
            `${location}:`,
            'Drop the trailing colon to have a prefix generated'
        );
    }
    const normalized = normalizeLocation(location);
    return Object.freeze(prefix !== undefined ? { location: normalized, prefix } : { location: normalized });
}

/**
 * Parses `location[:prefix]`.
 *
 * - a URL (`http...` or `scheme://...`) with a single colon is unprefixed
 * - otherwise the text after the last colon is the prefix, unless it
 *   contains a `/` (then it belongs to the location, e.g. a port)
 */
export function parseOntologyArgument(argument: string): OntologySource {
    const colons = argument.split(':').length - 1;
    if ((argument.startsWith('http') || hasUrlScheme(argument)) && colons === 1) {
        return createOntologySource(argument);
    }
    const index = argument.lastIndexOf(':');
    if (index === -1) {
        return createOntologySource(argument);
    }
    const prefix = argument.slice(index + 1);
    if (prefix.includes('/')) {
        return createOntologySource(argument);
    }
    return createOntologySource(argument.slice(0, index), prefix);
}
