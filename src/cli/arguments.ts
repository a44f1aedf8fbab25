import path from 'path';
import { z } from 'zod';
import type { OntologySource } from '../types/ontology.js';
import { DEFAULTS } from '../types/options.js';
import { createConfigurationError } from '../types/errors.js';
import { parseOntologyArgument } from '../ontology/source.js';

export const VERSION = '1.0.0';

export const HELP = `
owl2types v${VERSION}

Converts OWL ontologies into an OpenCCG types.xml file.

Usage:
  owl2types [options] <ontology[:prefix]>...

Arguments:
  ontology[:prefix]  Path or URL of an ontology, optionally followed by the
                     prefix for its types, e.g. ./ontologies/GUM-3.owl:gum.
                     Without a prefix one is generated from the file name.

Options:
  -o, --output <file>      Write to <file> instead of stdout
  -l, --lookup <dir>       Additional directory to search for imported
                           ontologies (repeatable; also ${DEFAULTS.lookupPathEnv})
  -x, --exclude-owl-thing  Leave out owl:Thing as the top level type
  --merge-duplicates       Union the parents of types defined more than once
                           instead of keeping the first definition
  --verbose                Report progress on stderr
  -h, --help               Show this help
  -v, --version            Show version

Examples:
  owl2types -x -l ./ontologies ./ontologies/SLM-cooking.owl:slm ./ontologies/UIO.owl:uio
  owl2types --output types.xml https://example.org/onto.owl
`;

const CliOptionsSchema = z.object({
    ontologies: z.array(z.string().min(1)),
    output: z.string().min(1, 'Output file name must not be empty').optional(),
    lookup: z.array(z.string().min(1, 'Lookup directory must not be empty')),
    excludeOwlThing: z.boolean(),
    mergeDuplicates: z.boolean(),
    verbose: z.boolean(),
    help: z.boolean(),
    version: z.boolean(),
});

type RawCliOptions = z.infer<typeof CliOptionsSchema>;

export interface CliOptions {
    sources: OntologySource[];
    output?: string;
    lookupPaths: string[];
    excludeOwlThing: boolean;
    mergeDuplicates: boolean;
    verbose: boolean;
    help: boolean;
    version: boolean;
}

const BOOLEAN_FLAGS: Record<string, 'excludeOwlThing' | 'mergeDuplicates' | 'verbose' | 'help' | 'version'> = {
    '-x': 'excludeOwlThing',
    '--exclude-owl-thing': 'excludeOwlThing',
    '--merge-duplicates': 'mergeDuplicates',
    '--verbose': 'verbose',
    '-h': 'help',
    '--help': 'help',
    '-v': 'version',
    '--version': 'version',
};

const VALUE_FLAGS: Record<string, 'output' | 'lookup'> = {
    '-o': 'output',
    '--output': 'output',
    '-l': 'lookup',
    '--lookup': 'lookup',
};

/**
 * Lookup directories from the environment, split on the platform delimiter.
 */
export function lookupPathsFromEnv(env: NodeJS.ProcessEnv): string[] {
    const value = env[DEFAULTS.lookupPathEnv];
    if (!value) {
        return [];
    }
    return value.split(path.delimiter).filter(dir => dir.length > 0);
}

function collect(args: readonly string[]): RawCliOptions {
    const raw: RawCliOptions = {
        ontologies: [],
        lookup: [],
        excludeOwlThing: false,
        mergeDuplicates: false,
        verbose: false,
        help: false,
        version: false,
    };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
        const flag = eq === -1 ? arg : arg.slice(0, eq);
        const inlineValue = eq === -1 ? undefined : arg.slice(eq + 1);

        const booleanFlag = BOOLEAN_FLAGS[flag];
        if (booleanFlag && inlineValue === undefined) {
            raw[booleanFlag] = true;
            continue;
        }

        const valueFlag = VALUE_FLAGS[flag];
        if (valueFlag) {
            let value = inlineValue;
            if (value === undefined) {
                if (i + 1 >= args.length) {
                    throw createConfigurationError(`Option ${flag} requires a value`, flag, 'See owl2types --help');
                }
                value = args[++i];
            }
            if (valueFlag === 'output') {
                raw.output = value;
            } else {
                raw.lookup.push(value);
            }
            continue;
        }

        if (arg.startsWith('-') && arg.length > 1) {
            throw createConfigurationError(`Unknown option: ${arg}`, arg, 'See owl2types --help');
        }
        raw.ontologies.push(arg);
    }

    return raw;
}

/**
 * Parses argv (without node and script) into validated options.
 */
export function parseCliArguments(
    args: readonly string[],
    env: NodeJS.ProcessEnv = process.env
): CliOptions {
    const parsed = CliOptionsSchema.safeParse(collect(args));
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw createConfigurationError(issue.message, issue.path.join('.'));
    }
    const raw = parsed.data;

    if (!raw.help && !raw.version && raw.ontologies.length === 0) {
        throw createConfigurationError(
            'At least one ontology is required',
            undefined,
            'Usage: owl2types [options] <ontology[:prefix]>...'
        );
    }

    return {
        sources: raw.ontologies.map(parseOntologyArgument),
        output: raw.output,
        lookupPaths: [...raw.lookup, ...lookupPathsFromEnv(env)],
        excludeOwlThing: raw.excludeOwlThing,
        mergeDuplicates: raw.mergeDuplicates,
        verbose: raw.verbose,
        help: raw.help,
        version: raw.version,
    };
}
