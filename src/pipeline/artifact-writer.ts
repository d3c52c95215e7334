/**
 * Artifact persistence.
 *
 * Writers take an ExtractedArtifact and put it somewhere. Writes are not
 * transactional: a run that stops halfway leaves earlier files updated.
 */

import { chmod, mkdir, writeFile } from 'fs/promises';
import { dirname, isAbsolute, relative, resolve } from 'path';
import { ExtractedArtifact } from '../domain/artifact';

/** Mode applied to executable artifacts (shell scripts). */
export const EXECUTABLE_MODE = 0o755;

/** Pluggable artifact sink. */
export interface ArtifactWriter {
  /** Persist the artifact and return where it went. */
  write(artifact: ExtractedArtifact): Promise<string>;
}

/** Writes artifacts below a root directory, creating parent directories. */
export class FileSystemArtifactWriter implements ArtifactWriter {
  readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = resolve(rootDir);
  }

  async write(artifact: ExtractedArtifact): Promise<string> {
    const target = this.resolveTarget(artifact.path);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, artifact.content, 'utf-8');
    if (artifact.executable) {
      await chmod(target, EXECUTABLE_MODE);
    }
    return target;
  }

  /** Absolute path for an artifact path. Paths escaping the root are rejected. */
  resolveTarget(artifactPath: string): string {
    const target = resolve(this.rootDir, artifactPath);
    const rel = relative(this.rootDir, target);
    if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
      throw new Error(`Artifact path resolves outside ${this.rootDir}: ${artifactPath}`);
    }
    return target;
  }
}

/**
 * In-memory writer for tests and dry runs.
 * Keyed by artifact path; a later write to the same path replaces the earlier one.
 */
export class MemoryArtifactWriter implements ArtifactWriter {
  readonly files = new Map<string, ExtractedArtifact>();

  async write(artifact: ExtractedArtifact): Promise<string> {
    this.files.set(artifact.path, { ...artifact });
    return artifact.path;
  }
}
