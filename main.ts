#!/usr/bin/env node
import { parseCliArgs } from './lib/cli';
import { executeOperation } from './lib/command-router';
import { getErrorMessage } from './lib/errors';

async function main(argv: string[]): Promise<number> {
    const parsed = parseCliArgs(argv);
    if (!parsed.ok) {
        console.error(`✗ ${parsed.error}`);
        console.log('Run "pmu help" for usage information.');
        return 1;
    }
    return executeOperation(parsed.options);
}

main(process.argv.slice(2)).then(
    code => {
        process.exitCode = code;
    },
    (error: unknown) => {
        console.error(`✗ Fatal error: ${getErrorMessage(error)}`);
        process.exitCode = 1;
    },
);
