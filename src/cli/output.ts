import fs from 'fs/promises';
import chalk from 'chalk';
import { createSerializationError, isOntologyException } from '../types/errors.js';

function writeStdout(text: string): Promise<void> {
    return new Promise((resolve, reject) => {
        process.stdout.write(text, error => (error ? reject(error) : resolve()));
    });
}

/**
 * Writes the finished document to a file, or to stdout when no file is given.
 */
export async function writeOutput(text: string, destination?: string): Promise<void> {
    try {
        if (destination === undefined) {
            await writeStdout(text);
        } else {
            await fs.writeFile(destination, text, 'utf-8');
        }
    } catch (e) {
        throw createSerializationError(destination ?? '<stdout>', e);
    }
}

/**
 * Human-readable report of a failure for stderr.
 */
export function formatFailure(error: unknown): string {
    if (isOntologyException(error)) {
        const lines = [chalk.red(`Error [${error.code}]: ${error.message}`)];
        if (error.error.suggestion) {
            lines.push(chalk.dim(`  ${error.error.suggestion}`));
        }
        return lines.join('\n');
    }
    const message = error instanceof Error ? error.message : String(error);
    return chalk.red(`Error: ${message}`);
}
