/**
 * src/app/build-app.ts
 *
 * WHY:
 * - Single place that assembles the runnable Fastify app:
 *   config -> deps -> server -> routes
 * - Makes E2E tests simple (build once, app.inject, close).
 */

import type { AppConfig } from './config';
import { buildDeps, type AppDeps } from './di';
import { buildServer } from './server';
import { registerRoutes } from './routes';

export async function buildApp(
  config: AppConfig,
  overrides: Partial<Pick<AppDeps, 'passwordHasher'>> = {},
) {
  const deps = buildDeps(config, overrides);
  const app = buildServer();

  registerRoutes(app, { config, deps });
  await app.ready();

  const close = async () => {
    await app.close();
  };

  return { app, deps, close };
}
