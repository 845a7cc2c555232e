/**
 * Express server configuration.
 *
 * Assembles the API surface with dependency injection. The toolchain used
 * for deploy and install is supplied by the embedding application.
 */

import express from 'express';
import { TrackerConfig, loadConfig } from './config';
import { FingerprintService } from './fingerprint/fingerprint-service';
import { Store } from './storage/store';
import { createMemoryStore } from './storage/memory-store';
import { ArtifactTracker } from './tracker/tracker-service';
import { createArtifactRecordRoutes, ToolchainProvider } from './api/artifact-records';
import { errorHandler } from './api/middleware';

const startTime = Date.now();

/** Application context containing all services. */
export interface AppContext {
  config: TrackerConfig;
  store: Store;
  fingerprints: FingerprintService;
  tracker: ArtifactTracker;
  toolchainFor: ToolchainProvider;
}

export interface AppContextOptions {
  toolchainFor: ToolchainProvider;
  store?: Store;
  config?: TrackerConfig;
}

/** Create the application context with all services. */
export function createAppContext(options: AppContextOptions): AppContext {
  const config = options.config ?? loadConfig();
  const store = options.store ?? createMemoryStore();
  const fingerprints = new FingerprintService(store.fingerprints);
  const tracker = new ArtifactTracker(store.records, fingerprints, { record: config.record });

  return {
    config,
    store,
    fingerprints,
    tracker,
    toolchainFor: options.toolchainFor,
  };
}

/** Create and configure the Express application. */
export function createApp(ctx: AppContext): express.Application {
  const app = express();

  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      uptimeMs: Date.now() - startTime,
      storage: 'memory',
    });
  });

  app.use('/api', createArtifactRecordRoutes(ctx.tracker, ctx.toolchainFor));

  app.use(errorHandler);

  return app;
}
