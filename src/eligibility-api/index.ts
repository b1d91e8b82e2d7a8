import { createServer } from 'http';
import path from 'path';
import { API_PREFIX } from '@shared/constants';
import { createBenefitRegistry } from '@core/benefits/registry';
import { loadCatalogPack, readPackManifest, type CatalogSnapshot } from '@core/catalog';
import { createDatabase } from '@db/connection';
import { loadCatalogFromDatabase } from '@db/catalog-repository';
import { config } from './config';
import { createApp } from './app';

async function loadCatalog(): Promise<CatalogSnapshot> {
  const packDir = path.resolve(config.catalog.packDir);
  if (config.catalog.source === 'file') {
    return loadCatalogPack(packDir);
  }

  const { db, pool } = createDatabase(config.database.url);
  try {
    return await loadCatalogFromDatabase(db, await readPackManifest(packDir));
  } finally {
    await pool.end();
  }
}

async function start() {
  const catalog = await loadCatalog();
  console.warn(
    `[CATALOG] Loaded ${catalog.meta.packId} from ${config.catalog.source} (${catalog.programs.length} programs, ${catalog.documents.size} documents)`,
  );
  for (const rejected of catalog.rejected) {
    console.warn(`[CATALOG] Skipped ${rejected.kind} ${rejected.ref}: ${rejected.reason}`);
  }

  const registry = createBenefitRegistry(catalog.benefitRules);
  const app = createApp(
    { catalog, registry, policy: config.matching },
    { clientUrl: config.clientUrl },
  );
  const server = createServer(app);

  function shutdown(signal: string) {
    console.warn(`[SERVER] ${signal} received, shutting down`);
    server.close(() => process.exit(0));
    setTimeout(() => process.exit(1), 5000).unref();
  }
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  server.listen(config.port, () => {
    console.warn(`[SERVER] Benefits Navigator API on port ${config.port}`);
    console.warn(`[SERVER] Health: http://localhost:${config.port}${API_PREFIX}/health`);
  });
}

start().catch((err) => {
  console.error('[SERVER] Failed to start:', err);
  process.exit(1);
});
