import { createServer } from 'http';
import path from 'path';
import { RuleSetRegistry } from '@core/registry';
import { API_PREFIX } from '@shared/constants';
import { createApp } from './app';
import { config } from './config';

async function reloadRuleSets(registry: RuleSetRegistry) {
  try {
    const schemeCodes = await registry.reload();
    console.warn(`[POLICY] Reloaded ${schemeCodes.length} rule set(s): ${schemeCodes.join(', ')}`);
  } catch (err) {
    console.error('[POLICY] Reload failed, keeping previous rule sets:', err);
  }
}

async function start() {
  const rulesDir = path.resolve(config.ruleSetsDir);
  const registry = await RuleSetRegistry.fromDirectory(rulesDir);
  for (const ruleSet of registry.list()) {
    console.warn(
      `[POLICY] Loaded ${ruleSet.meta.schemeCode} v${ruleSet.meta.version} (${ruleSet.ruleIndex.size} rules)`,
    );
  }

  const app = createApp(registry, {
    clientUrl: config.clientUrl,
    bulkLimit: config.bulkLimit,
    logRequests: config.nodeEnv !== 'test',
  });
  const server = createServer(app);

  function shutdown(signal: string) {
    console.warn(`[SERVER] ${signal} received, shutting down`);
    server.close(() => process.exit(0));
    setTimeout(() => process.exit(1), 5000).unref();
  }

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGHUP', () => {
    console.warn('[SERVER] SIGHUP received, reloading rule sets');
    void reloadRuleSets(registry);
  });

  server.listen(config.port, () => {
    console.warn(`[SERVER] Scheme eligibility API on port ${config.port}`);
    console.warn(`[SERVER] Health: http://localhost:${config.port}${API_PREFIX}/health`);
  });
}

start().catch((err) => {
  console.error('[SERVER] Failed to start:', err);
  process.exit(1);
});
