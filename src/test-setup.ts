// Test setup - runs before every test file
import { loadEnv } from '@src/lib/env/load-env.js';

loadEnv({ path: '.env.test' });

// Request and pipeline logs are noise under test unless asked for
process.env.LOG_LEVEL ??= 'silent';
