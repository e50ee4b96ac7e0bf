/**
 * Loads .env.local, then .env. Import first: ES modules evaluate their
 * imports in order, and the logger reads LOG_LEVEL when it loads.
 */

import dotenv from 'dotenv';
import { resolve } from 'path';

dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config();
