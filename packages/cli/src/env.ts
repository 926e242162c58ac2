/**
 * Loads .env before any other module reads the environment
 */

import { config } from 'dotenv';

config();

// Keep routine log lines out of interactive use unless asked for
process.env.LOG_LEVEL ??= 'warn';
