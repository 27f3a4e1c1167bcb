import { USAGE, run } from './cli';

try {
    run(process.argv.slice(2));
} catch (err) {
    console.error(`[CLI] ${err instanceof Error ? err.message : String(err)}`);
    if (err instanceof TypeError) console.error(USAGE); // parseArgs rejects unknown flags this way
    process.exitCode = 1;
}
