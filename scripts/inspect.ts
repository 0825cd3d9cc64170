#!/usr/bin/env tsx

import { config as loadEnv } from 'dotenv';
import { DecomposedFloat, formatBits, formatDebug } from '../src/lib/float/index.js';
import { logError, logWarn } from '../src/utils/logger.js';

function main(args: string[]): number {
    if (args.length === 0) {
        logWarn('usage: inspect <number...>', 'inspect');
        return 1;
    }

    let failed = 0;
    for (const raw of args) {
        const value = raw.trim() === '' ? Number.NaN : Number(raw);
        const decomposed = DecomposedFloat.fromNumber(value);
        if (decomposed === null) {
            logWarn(`not a finite number: ${raw}`, 'inspect');
            failed++;
            continue;
        }
        console.log(formatDebug(decomposed));
        console.log(`Fields: ${formatBits(decomposed)}`);
        console.log('');
    }
    return failed > 0 ? 1 : 0;
}

if (require.main === module) {
    loadEnv();
    try {
        process.exitCode = main(process.argv.slice(2));
    } catch (err) {
        logError('Inspect failed', 'inspect', err);
        process.exitCode = 1;
    }
}
