/**
 * Phase Cache
 *
 * Persists one JSON document per (runIdentifier, phase). The orchestrator
 * checks it before every phase and writes to it after a phase succeeds,
 * which makes re-runs resumable and idempotent.
 *
 * Layout: `<dataDir>/<runIdentifier>/<phase>.json`
 */

import { mkdir, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import type { ZodIssue, ZodType, ZodTypeDef } from 'zod';

import { createPrefixedLogger, type Logger } from '../../utils/logger';
import { formatIssues, type PhaseCacheName } from './types';

// ============================================================================
// Validation
// ============================================================================

/**
 * A stored document did not match the shape expected for its phase.
 */
export class ArtifactValidationError extends Error {
  readonly name = 'ArtifactValidationError';

  constructor(readonly issues: readonly ZodIssue[]) {
    super(`Artifact failed validation: ${formatIssues(issues)}`);
  }
}

export type ValidationResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: ArtifactValidationError };

/**
 * Checks an untyped document against the expected artifact shape.
 */
export function validateArtifact<T>(document: unknown, schema: ZodType<T, ZodTypeDef, unknown>): ValidationResult<T> {
  const parsed = schema.safeParse(document);
  if (parsed.success) {
    return { ok: true, value: parsed.data };
  }
  return { ok: false, error: new ArtifactValidationError(parsed.error.issues) };
}

// ============================================================================
// Cache Contract
// ============================================================================

export interface PhaseCache {
  exists(namespace: string, phase: PhaseCacheName): Promise<boolean>;
  /**
   * Returns the stored artifact, or null when it is missing or fails validation.
   * Corrupted documents never throw; they are reported as a miss.
   */
  load<T>(namespace: string, phase: PhaseCacheName, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T | null>;
  save(namespace: string, phase: PhaseCacheName, artifact: unknown): Promise<void>;
  /** Removes one phase document, or the whole namespace when phase is omitted. */
  clear(namespace: string, phase?: PhaseCacheName): Promise<void>;
}

// ============================================================================
// File-Backed Implementation
// ============================================================================

export interface FilePhaseCacheOptions {
  readonly dataDir: string;
  readonly logger?: Logger;
}

export class FilePhaseCache implements PhaseCache {
  private readonly dataDir: string;
  private readonly log: Logger;

  constructor(options: FilePhaseCacheOptions) {
    this.dataDir = options.dataDir;
    this.log = options.logger ?? createPrefixedLogger('[PhaseCache]');
  }

  /** Directory holding every document of a run. */
  namespaceDir(namespace: string): string {
    return join(this.dataDir, namespace);
  }

  documentPath(namespace: string, phase: PhaseCacheName): string {
    return join(this.namespaceDir(namespace), `${phase}.json`);
  }

  async exists(namespace: string, phase: PhaseCacheName): Promise<boolean> {
    try {
      const info = await stat(this.documentPath(namespace, phase));
      return info.isFile();
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }

  async load<T>(namespace: string, phase: PhaseCacheName, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T | null> {
    const path = this.documentPath(namespace, phase);

    let raw: string;
    try {
      raw = await readFile(path, 'utf8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }

    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch (error) {
      this.log.warn(`Ignoring unreadable ${phase} artifact at ${path}: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }

    const result = validateArtifact(document, schema);
    if (!result.ok) {
      this.log.warn(`Ignoring stale ${phase} artifact at ${path}: ${result.error.message}`);
      return null;
    }
    return result.value;
  }

  async save(namespace: string, phase: PhaseCacheName, artifact: unknown): Promise<void> {
    await mkdir(this.namespaceDir(namespace), { recursive: true });
    await writeFile(this.documentPath(namespace, phase), `${JSON.stringify(artifact, null, 2)}\n`, 'utf8');
    this.log.debug(`Saved ${phase} artifact for ${namespace}`);
  }

  async clear(namespace: string, phase?: PhaseCacheName): Promise<void> {
    if (phase) {
      await rm(this.documentPath(namespace, phase), { force: true });
      this.log.info(`Cleared ${phase} artifact for ${namespace}`);
      return;
    }
    await rm(this.namespaceDir(namespace), { recursive: true, force: true });
    this.log.info(`Cleared all artifacts for ${namespace}`);
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
