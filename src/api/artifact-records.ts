/**
 * Artifact record API routes.
 *
 * GET  /builds/:buildId/artifacts               exported view of the build's record
 * POST /builds/:buildId/artifacts/deploy        redeploy to a remote repository
 * POST /builds/:buildId/artifacts/install       install into the local repository
 * POST /builds/:buildId/artifacts/fingerprints  record fingerprints again
 */

import { Router } from 'express';
import { OwningBuild } from '../domain/build';
import { apiError, toTypedError, validationError } from '../domain/errors';
import { Toolchain } from '../domain/toolchain';
import { BufferedTaskLog } from '../toolchain/task-log';
import { ConfigurableRemoteRepository, RemoteRepositoryInput } from '../toolchain/repository';
import { ArtifactTracker } from '../tracker/tracker-service';
import { getHttpStatus } from './middleware';

/** Supplies the toolchain to run an operation on a build's record with. */
export type ToolchainProvider = (build: OwningBuild) => Toolchain;

type ParseResult = { ok: true; repository: RemoteRepositoryInput } | { ok: false; message: string };

/** Validate a deploy request body: `{ repository: { id, url, uniqueVersion? } }`. */
export function parseDeployBody(body: unknown): ParseResult {
  if (typeof body !== 'object' || body === null || !('repository' in body)) {
    return { ok: false, message: 'Request body must contain a "repository" object' };
  }
  const repository = body.repository;
  if (typeof repository !== 'object' || repository === null) {
    return { ok: false, message: '"repository" must be an object' };
  }
  const id = 'id' in repository ? repository.id : undefined;
  const url = 'url' in repository ? repository.url : undefined;
  const uniqueVersion = 'uniqueVersion' in repository ? repository.uniqueVersion : undefined;

  if (typeof id !== 'string' || id.trim() === '') {
    return { ok: false, message: '"repository.id" must be a non-empty string' };
  }
  if (typeof url !== 'string' || url.trim() === '') {
    return { ok: false, message: '"repository.url" must be a non-empty string' };
  }
  if (uniqueVersion !== undefined && typeof uniqueVersion !== 'boolean') {
    return { ok: false, message: '"repository.uniqueVersion" must be a boolean' };
  }
  return { ok: true, repository: { id, url, uniqueVersion } };
}

export function createArtifactRecordRoutes(tracker: ArtifactTracker, toolchainFor: ToolchainProvider): Router {
  const router = Router();

  router.get('/builds/:buildId/artifacts', async (req, res, next) => {
    try {
      const record = await tracker.getRecord(req.params.buildId);
      res.json({ record: record.toExportedView() });
    } catch (err) {
      next(err);
    }
  });

  router.post('/builds/:buildId/artifacts/deploy', async (req, res, next) => {
    const parsed = parseDeployBody(req.body);
    if (!parsed.ok) {
      res.status(400).json(apiError(validationError(parsed.message)));
      return;
    }

    const { buildId } = req.params;
    const repository = new ConfigurableRemoteRepository(parsed.repository);
    const log = new BufferedTaskLog();
    try {
      const record = await tracker.getRecord(buildId);
      await tracker.deploy(buildId, toolchainFor(record.build), repository, log);
      res.json({ log: log.lines, repository: repository.toJSON() });
    } catch (err) {
      if (log.lines.length === 0) {
        next(err);
        return;
      }
      // Part of the set may already be deployed; show how far it got.
      const typedError = toTypedError(err, buildId);
      res.status(getHttpStatus(typedError)).json({ ...apiError(typedError), log: log.lines });
    }
  });

  router.post('/builds/:buildId/artifacts/install', async (req, res, next) => {
    try {
      const record = await tracker.getRecord(req.params.buildId);
      await tracker.install(req.params.buildId, toolchainFor(record.build));
      res.json({ installed: true });
    } catch (err) {
      next(err);
    }
  });

  router.post('/builds/:buildId/artifacts/fingerprints', async (req, res, next) => {
    try {
      const fingerprints = await tracker.recordFingerprints(req.params.buildId);
      res.json({ fingerprints });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
