import fs from 'fs';
import os from 'os';
import path from 'path';
import chalk from 'chalk';
import { jest } from '@jest/globals';
import { run } from '../src/cli/run.js';

const DATA = path.join(__dirname, 'data');

function captureStderr() {
    return jest.spyOn(console, 'error').mockImplementation(() => undefined);
}

describe('run', () => {
    let dir: string;
    let level: typeof chalk.level;
    let stderr: ReturnType<typeof captureStderr>;

    beforeAll(() => {
        level = chalk.level;
        chalk.level = 0;
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'owl2types-run-'));
    });

    afterAll(() => {
        chalk.level = level;
        fs.rmSync(dir, { recursive: true, force: true });
    });

    beforeEach(() => {
        stderr = captureStderr();
    });

    afterEach(() => {
        stderr.mockRestore();
    });

    test('writes the converted document and exits with 0', async () => {
        const output = path.join(dir, 'types.xml');

        const status = await run([`${path.join(DATA, 'animals.ttl')}:an`, '-l', DATA, '-x', '-o', output], {});

        expect(status).toBe(0);
        expect(stderr).not.toHaveBeenCalled();
        const lines = fs.readFileSync(output, 'utf-8').split('\n');
        expect(lines.slice(-7)).toEqual([
            '    <type name="an-Animal" parents="lt-LivingThing" />',
            '    <type name="an-Dog" parents="an-Animal" />',
            '    <type name="an-Person" />',
            '    <type name="lt-LivingThing" />',
            '    <type name="lt-Plant" parents="lt-LivingThing" />',
            '</types>',
            '',
        ]);
    });

    test('a failed load exits with 1 and writes nothing', async () => {
        const output = path.join(dir, 'never.xml');

        const status = await run([path.join(DATA, 'missing.ttl'), '-o', output], {});

        expect(status).toBe(1);
        expect(fs.existsSync(output)).toBe(false);
        expect(stderr).toHaveBeenCalledTimes(1);
        expect(String(stderr.mock.calls[0][0])).toMatch(/^Error \[LOAD_ERROR\]: Could not load ontology 'file:\/\/\/.*missing\.ttl'/);
    });

    test('a failing import exits with 1 and writes nothing', async () => {
        const output = path.join(dir, 'broken.xml');

        const status = await run([path.join(DATA, 'broken-import.ttl'), '-l', DATA, '-o', output], {});

        expect(status).toBe(1);
        expect(fs.existsSync(output)).toBe(false);
    });

    test('argument errors exit with 1', async () => {
        expect(await run(['--bogus'], {})).toBe(1);
        expect(stderr).toHaveBeenCalledWith('Error [CONFIGURATION_ERROR]: Unknown option: --bogus\n  See owl2types --help');
    });

    test('prints the version', async () => {
        const stdout = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        try {
            expect(await run(['--version'], {})).toBe(0);
            expect(stdout).toHaveBeenCalledWith('1.0.0');
        } finally {
            stdout.mockRestore();
        }
    });
});
