#!/usr/bin/env tsx

import { config as loadEnv } from 'dotenv';
import { loadBenchConfig } from '../src/config/index.js';
import { formatResult, getSink, runSuite, type BenchResult } from '../src/bench/harness.js';
import { logDebug, logError, logInfo, setLogLevel } from '../src/utils/logger.js';

function printGroup(title: string, results: BenchResult[]): void {
    logInfo(`${title} (${results[0]?.iterations ?? 0} iterations per case)`, 'bench');
    for (const r of results) logInfo(formatResult(r), 'bench');
}

function main(): void {
    loadEnv();
    const config = loadBenchConfig();
    setLogLevel(config.logLevel);
    logDebug('Benchmarking with config', 'bench', config);

    const results = runSuite(config);
    printGroup('Comparison', results.filter(r => r.group === 'comparison'));
    printGroup('Conversion', results.filter(r => r.group === 'conversion'));
    printGroup('Ordering', results.filter(r => r.group === 'ordering'));
    logDebug(`sink=${getSink()}`, 'bench');
}

if (require.main === module) {
    try {
        main();
    } catch (err) {
        logError('Benchmark failed', 'bench', err);
        process.exitCode = 1;
    }
}
