/**
 * Loads `.env` before anything reads process.env (the shared logger
 * picks up LOG_LEVEL when first imported).
 */

import { config as dotenvConfig } from 'dotenv';

dotenvConfig();
