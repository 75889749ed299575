// src/bin.ts

import { loadEnv } from '@/lib/config';
import { EXIT_ABORTED, main } from './cli';

loadEnv();

main(process.argv.slice(2))
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        console.error('Unhandled error:', error);
        process.exitCode = EXIT_ABORTED;
    });
