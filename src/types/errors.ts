/**
 * Structured errors for owl2types
 *
 * Every failure carries a code so the CLI can report it uniformly.
 */

/**
 * Error codes for the conversion pipeline
 */
export type OntologyErrorCode =
  | 'CONFIGURATION_ERROR'   // Malformed argument or option
  | 'LOAD_ERROR'            // Location unreadable, content unparseable, import missing
  | 'UNRESOLVED_ONTOLOGY'   // Class belongs to an ontology without a prefix
  | 'SERIALIZATION_ERROR';  // Output sink failed

/**
 * Structured error with code, message and suggestion
 */
export interface OntologyError {
  code: OntologyErrorCode;
  message: string;
  suggestion?: string;
  context?: string;          // The offending location or argument
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping OntologyError for throw/catch patterns
 */
export class OntologyException extends Error {
  public readonly error: OntologyError;

  constructor(error: OntologyError, options?: { cause?: unknown }) {
    super(error.message, options);
    this.name = 'OntologyException';
    this.error = error;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, OntologyException);
    }
  }

  get code(): OntologyErrorCode {
    return this.error.code;
  }

  toJSON(): OntologyError {
    return this.error;
  }
}

export function isOntologyException(value: unknown): value is OntologyException {
  return value instanceof OntologyException;
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Create a configuration error for a malformed argument or option
 */
export function createConfigurationError(
  message: string,
  argument?: string,
  suggestion?: string
): OntologyException {
  return new OntologyException({
    code: 'CONFIGURATION_ERROR',
    message,
    suggestion,
    context: argument,
  });
}

/**
 * Create a load error naming the location that failed
 */
export function createLoadError(
  location: string,
  cause?: unknown
): OntologyException {
  const reason = cause === undefined ? 'unknown failure' : describeCause(cause);
  return new OntologyException({
    code: 'LOAD_ERROR',
    message: `Could not load ontology '${location}': ${reason}`,
    suggestion: 'Check the location, or add the directory holding imported ontologies with --lookup',
    context: location,
  }, { cause });
}

/**
 * Create an error for a class whose ontology was never assigned a prefix
 */
export function createUnresolvedOntologyError(
  ontologyName: string,
  classIri: string
): OntologyException {
  return new OntologyException({
    code: 'UNRESOLVED_ONTOLOGY',
    message: `No prefix known for ontology '${ontologyName}' (needed by ${classIri})`,
    suggestion: 'Pass the ontology explicitly or make sure it is imported',
    context: classIri,
    details: { ontologyName },
  });
}

/**
 * Create a serialization error for a failing output sink
 */
export function createSerializationError(
  destination: string,
  cause?: unknown
): OntologyException {
  const reason = cause === undefined ? 'unknown failure' : describeCause(cause);
  return new OntologyException({
    code: 'SERIALIZATION_ERROR',
    message: `Could not write output to '${destination}': ${reason}`,
    context: destination,
  }, { cause });
}
