import type { Server } from 'http';
import path from 'path';
import { createBenefitRegistry } from '@core/benefits/registry';
import { loadCatalogPack } from '@core/catalog';
import { DEFAULT_MATCHING_POLICY } from '@core/policy';
import { createApp } from '@api/app';

export interface TestServer {
  baseUrl: string;
  close: () => Promise<void>;
}

/** Serves the Florida pack on an ephemeral local port. */
export async function startTestServer(): Promise<TestServer> {
  const catalog = await loadCatalogPack(path.resolve('catalog-packs/florida-brevard-2024'));
  const app = createApp(
    { catalog, registry: createBenefitRegistry(catalog.benefitRules), policy: DEFAULT_MATCHING_POLICY },
    { clientUrl: 'http://localhost:5174', logRequests: false },
  );

  const server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, '127.0.0.1', () => resolve(s));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Test server is not listening on a TCP port');
  }
  const { port } = address;

  return {
    baseUrl: `http://127.0.0.1:${port}/api`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

export async function postJson(url: string, body: unknown): Promise<Response> {
  return fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

// Response bodies are asserted field by field, so they are left untyped here.
export async function readJson(res: Response) {
  return JSON.parse(await res.text());
}
