/**
 * Gene gap API server
 * -------------------
 * Serves gene data at four tiers (curated, expanded, genome-wide, derived gap
 * candidates). All artifacts are read once at startup; restart to pick up a new
 * batch run.
 *
 * Env (all optional): PORT, HOST, SERVICE_NAME, CURATED_ROOT, EXPANDED_DIR, DERIVED_DIR
 *   npm run build && npm start
 */

import { loadConfig } from './src/config.js';
import { createApp } from './src/serving/app.js';
import { loadServedSnapshot } from './src/serving/snapshot.js';

const config = loadConfig();
const snapshot = await loadServedSnapshot(config.paths);
const app = createApp(snapshot, { serviceName: config.serviceName });

app.listen(config.port, config.host, () =>
  console.log(`[api] ${config.serviceName} listening on http://${config.host}:${config.port}/`)
);
