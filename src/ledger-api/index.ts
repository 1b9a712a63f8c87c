import { createServer } from 'http';
import { API_PREFIX } from '@shared/constants';
import { config } from '@shared/config';
import { loadPolicyPack } from '@core/policy-pack';
import { createApp } from './app';

async function start() {
  const policyPack = await loadPolicyPack(config.policyPackDir);
  console.warn(`[POLICY] Loaded ${policyPack.meta.packId} (${policyPack.rules.ruleSetId})`);

  const app = createApp({ policyPack, dataDir: config.dataDir });
  const server = createServer(app);

  function shutdown(signal: string) {
    console.warn(`[SERVER] ${signal} received, shutting down`);
    server.close(() => process.exit(0));
    setTimeout(() => process.exit(1), 5000).unref();
  }

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  server.listen(config.port, () => {
    console.warn(`[SERVER] VR ledger API on port ${config.port}`);
    console.warn(`[SERVER] Health: http://localhost:${config.port}${API_PREFIX}/health`);
  });
}

start().catch((err) => {
  console.error('[SERVER] Failed to start:', err);
  process.exit(1);
});
