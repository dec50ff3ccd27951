import { config } from 'dotenv';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';

// Imported first by the entry point so LOG_LEVEL and friends are set before
// the shared logger is created

const __dirname = dirname(fileURLToPath(import.meta.url));

// Monorepo root first, then the package's own .env
config({ path: resolve(__dirname, '../../../../.env') });
config({ path: resolve(__dirname, '../../.env') });
