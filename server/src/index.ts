import { serve } from '@hono/node-server';
import * as dotenv from 'dotenv';
import app from './app.js';
import { loadConfig } from './config.js';
import { getDb } from './db/index.js';

dotenv.config();

const { port, archiveRoot } = loadConfig();

// Open the database and apply the schema before the first request
getDb();

console.log(`Archive root: ${archiveRoot}`);
console.log(`Server is running on port ${port}`);

serve({
  fetch: app.fetch,
  port,
});
