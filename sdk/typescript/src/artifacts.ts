/**
 * Portal SDK - Artifacts
 *
 * Artifact methods on PortalClient:
 *   - postArtifact(taskId, name, source): Promise<ServerMessage>
 *   - getArtifact(artifactId): Promise<Artifact>
 */

import { readFile } from 'node:fs/promises';

export type { Artifact } from './types.js';

export type ArtifactSource = string | Uint8Array;

/**
 * Recover the display name from a Content-Disposition header.
 *
 * The portal stores `name_<suffix>.ext`; the suffix between the last `_` and
 * the last `.` is dropped, so `report_20240101.pdf` becomes `report.pdf`.
 */
export function parseArtifactFilename(contentDisposition: string): string {
  let filename = contentDisposition.slice(contentDisposition.lastIndexOf('=') + 1).trim();
  if (filename.length >= 2 && filename.startsWith('"') && filename.endsWith('"')) {
    filename = filename.slice(1, -1);
  }

  const underscore = filename.lastIndexOf('_');
  const dot = filename.lastIndexOf('.');
  if (underscore < 0 || dot < underscore) {
    return filename;
  }
  return filename.slice(0, underscore) + filename.slice(dot);
}

// Paths are read in full before the request is sent.
export async function readArtifactContent(source: ArtifactSource): Promise<Uint8Array> {
  if (typeof source === 'string') {
    return readFile(source);
  }
  return source;
}
