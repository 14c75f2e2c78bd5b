/**
 * Populate process.env from .env (project root, or TP90X_ENV_FILE) before the
 * logger reads DEBUG and before config overrides are applied.
 * Must be the first import of the monitor entry point.
 */
import { config } from 'dotenv';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';

const root: string = join(dirname(fileURLToPath(import.meta.url)), '..');
config({ path: process.env.TP90X_ENV_FILE ?? join(root, '.env') });
