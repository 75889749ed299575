// src/lib/config/load-env.ts

import path from 'node:path';
import dotenv from 'dotenv';

/**
 * Load env files for a run. Precedence: process environment > .env.local > .env.
 * Neither file overrides a variable that is already set, so .env.local is loaded first.
 */
export function loadEnv(cwd: string = process.cwd()): void {
    dotenv.config({ path: path.join(cwd, '.env.local') });
    dotenv.config({ path: path.join(cwd, '.env') });
}
