/**
 * Artifact Store
 *
 * Deterministic artifact paths and no-clobber persistence:
 *
 *   {outputDirectory}/{caseGroup?}/{datasetStem}_{caseLabel}_v{1|2}.{ext}
 *
 * Payloads are written to a temp file beside the target, then linked into
 * place (fails if the target appeared meanwhile) or, with overwrite,
 * renamed over it. A cancelled or crashed run never leaves a partial file
 * under the final name.
 */

import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import type { Artifact, ArtifactVersion, WorkflowRequest } from '../types.js';
import { requestContext } from '../types.js';
import { datasetStem } from '../data/dataset.js';
import { ArtifactConflictError, ArtifactWriteError, toError } from '../errors/index.js';
import { SVG_EXTENSION } from './generator.js';

const VERSIONS: readonly ArtifactVersion[] = ['v1', 'v2'];

/**
 * Where a request's artifact of the given version lives.
 */
export function artifactPath(request: WorkflowRequest, version: ArtifactVersion, extension = SVG_EXTENSION): string {
  const directory = request.caseGroup
    ? path.join(request.outputDirectory, sanitizeSegment(request.caseGroup))
    : request.outputDirectory;
  const stem = datasetStem(request.datasetReference);
  return path.join(directory, `${stem}_${sanitizeSegment(request.caseLabel)}_${version}.${extension}`);
}

function sanitizeSegment(value: string): string {
  return value.trim().replace(/[^\w.-]+/g, '_') || '_';
}

function errnoCode(err: unknown): string | undefined {
  return err instanceof Error && 'code' in err ? String(err.code) : undefined;
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') return false;
    throw err;
  }
}

/**
 * Fail before any model call if a prior run's artifacts would be replaced.
 *
 * @throws ArtifactConflictError naming the first existing path
 */
export async function assertWritable(request: WorkflowRequest, extension = SVG_EXTENSION): Promise<void> {
  if (request.overwrite) return;
  for (const version of VERSIONS) {
    const target = artifactPath(request, version, extension);
    if (await exists(target)) {
      throw new ArtifactConflictError(target, requestContext(request));
    }
  }
}

/**
 * Write the artifact to its deterministic path and return it with `path` set.
 *
 * @throws ArtifactConflictError if the target exists and overwrite is off
 * @throws ArtifactWriteError on any other file system failure
 */
export async function persist(artifact: Artifact): Promise<Artifact> {
  const { request } = artifact;
  const target = artifactPath(request, artifact.version, artifact.extension);
  const tempPath = `${target}.tmp.${process.pid}.${Math.random().toString(36).slice(2, 8)}`;
  const context = { ...requestContext(request), version: artifact.version };

  try {
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(tempPath, artifact.payload);

    if (request.overwrite) {
      await fs.rename(tempPath, target);
    } else {
      // link() refuses an existing target, so a file that appeared since the
      // pre-flight check is still never replaced
      await fs.link(tempPath, target);
      await fs.unlink(tempPath);
    }
  } catch (err) {
    await fs.rm(tempPath, { force: true });
    if (errnoCode(err) === 'EEXIST') {
      throw new ArtifactConflictError(target, context);
    }
    throw new ArtifactWriteError(target, context, toError(err));
  }

  return Object.freeze({ ...artifact, path: target });
}
