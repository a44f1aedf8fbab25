import chalk from 'chalk';
import type { Logger } from '../types/ontology.js';

/**
 * Progress output for the CLI. Everything goes to stderr; stdout may be
 * carrying the document.
 */
export function createConsoleLogger(): Logger {
    return {
        info: (message: string) => console.error(chalk.dim(message)),
        warn: (message: string) => console.error(chalk.yellow(`Warning: ${message}`)),
    };
}
