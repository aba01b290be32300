/**
 * Side-effect import: load .env.local first, then fall back to .env.
 * Import before anything that reads process.env at module load.
 */

import dotenv from 'dotenv';
import { resolve } from 'path';

dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config();
