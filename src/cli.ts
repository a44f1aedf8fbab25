#!/usr/bin/env node
import 'dotenv/config';
import { run } from './cli/run.js';

run(process.argv.slice(2)).then(status => {
    process.exitCode = status;
});
