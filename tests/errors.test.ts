/**
 * Tests for structured error system
 */

import {
    OntologyError,
    OntologyException,
    createConfigurationError,
    createLoadError,
    createSerializationError,
    createUnresolvedOntologyError,
    isOntologyException,
} from '../src/types/errors.js';

describe('OntologyException', () => {
    test('creates exception with error object', () => {
        const error: OntologyError = {
            code: 'LOAD_ERROR',
            message: 'Could not load',
            context: 'file:///a.owl',
        };

        const exception = new OntologyException(error);

        expect(exception.name).toBe('OntologyException');
        expect(exception.message).toBe('Could not load');
        expect(exception.code).toBe('LOAD_ERROR');
        expect(exception.toJSON()).toEqual(error);
        expect(isOntologyException(exception)).toBe(true);
        expect(isOntologyException(new Error('plain'))).toBe(false);
    });
});

describe('error factories', () => {
    test('createLoadError names the location and keeps the cause', () => {
        const cause = new Error('ENOENT: no such file');
        const error = createLoadError('file:///a.owl', cause);

        expect(error.code).toBe('LOAD_ERROR');
        expect(error.message).toBe("Could not load ontology 'file:///a.owl': ENOENT: no such file");
        expect(error.error.context).toBe('file:///a.owl');
        expect(error.cause).toBe(cause);
    });

    test('createLoadError without cause', () => {
        expect(createLoadError('x.owl').message).toBe("Could not load ontology 'x.owl': unknown failure");
    });

    test('createConfigurationError', () => {
        const error = createConfigurationError('Unknown option: --y', '--y', 'See owl2types --help');
        expect(error.toJSON()).toEqual({
            code: 'CONFIGURATION_ERROR',
            message: 'Unknown option: --y',
            suggestion: 'See owl2types --help',
            context: '--y',
        });
    });

    test('createUnresolvedOntologyError', () => {
        const error = createUnresolvedOntologyError('extra', 'http://example.org/extra#Thing');
        expect(error.code).toBe('UNRESOLVED_ONTOLOGY');
        expect(error.error.details).toEqual({ ontologyName: 'extra' });
    });

    test('createSerializationError', () => {
        const error = createSerializationError('/readonly/types.xml', 'EACCES');
        expect(error.message).toBe("Could not write output to '/readonly/types.xml': EACCES");
    });
});
