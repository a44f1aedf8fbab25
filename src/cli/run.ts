import { HELP, VERSION, parseCliArguments } from './arguments.js';
import { formatFailure, writeOutput } from './output.js';
import { RdfOntologyLoader } from '../loader/rdfLoader.js';
import { flattenOntologies } from '../pipeline.js';
import { silentLogger } from '../types/ontology.js';
import { createConsoleLogger } from '../utils/logger.js';

async function convert(args: readonly string[], env: NodeJS.ProcessEnv): Promise<void> {
    const options = parseCliArguments(args, env);

    if (options.help) {
        console.log(HELP);
        return;
    }
    if (options.version) {
        console.log(VERSION);
        return;
    }

    const logger = options.verbose ? createConsoleLogger() : silentLogger;
    const loader = new RdfOntologyLoader({ lookupPaths: options.lookupPaths, logger });

    // Rendered in full before the destination is touched.
    const document = await flattenOntologies(options.sources, {
        loader,
        excludeRoot: options.excludeOwlThing,
        mergeDuplicates: options.mergeDuplicates,
        logger,
    });
    await writeOutput(`${document}\n`, options.output);
}

/**
 * Runs the command line and resolves to the process exit status.
 * Failures are reported on stderr.
 */
export async function run(args: readonly string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
    try {
        await convert(args, env);
        return 0;
    } catch (error) {
        console.error(formatFailure(error));
        return 1;
    }
}
