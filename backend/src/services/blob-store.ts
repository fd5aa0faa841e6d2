/**
 * Job blob store, addressed by job id and relative path.
 * Layout per job: input/<file>, output/<file>, logs/output.log
 */

import { promises as fs, type Dirent } from 'fs';
import path from 'path';
import type { SupabaseClient } from '@supabase/supabase-js';
import { TransientInfraError, ValidationError } from '../errors.js';

export interface BlobStore {
  write(jobId: string, blobPath: string, bytes: Buffer): Promise<void>;
  /** null when the blob does not exist. */
  read(jobId: string, blobPath: string): Promise<Buffer | null>;
  /** Relative paths under `prefix`, sorted. */
  list(jobId: string, prefix: string): Promise<string[]>;
}

const SEGMENT_RE = /^[A-Za-z0-9._-]+$/;

/** Validates a relative blob path and returns it in normalized form. */
export function normalizeBlobPath(blobPath: string): string {
  const segments = blobPath.split('/').filter((s) => s !== '' && s !== '.');
  if (blobPath.startsWith('/') || segments.length === 0) {
    throw new ValidationError(`Invalid path "${blobPath}": must be relative and non-empty`);
  }
  for (const segment of segments) {
    if (segment === '..' || !SEGMENT_RE.test(segment)) {
      throw new ValidationError(`Invalid path "${blobPath}"`);
    }
  }
  return segments.join('/');
}

function assertJobId(jobId: string): void {
  if (!SEGMENT_RE.test(jobId)) throw new ValidationError(`Invalid job id "${jobId}"`);
}

// ── Shared filesystem ──

export class FsBlobStore implements BlobStore {
  constructor(private readonly root: string) {}

  private resolve(jobId: string, blobPath: string): string {
    assertJobId(jobId);
    return path.join(this.root, 'jobs', jobId, normalizeBlobPath(blobPath));
  }

  async write(jobId: string, blobPath: string, bytes: Buffer): Promise<void> {
    const target = this.resolve(jobId, blobPath);
    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, bytes);
    } catch (err: unknown) {
      throw new TransientInfraError(`Blob write failed for ${jobId}/${blobPath}`, { cause: String(err) });
    }
  }

  async read(jobId: string, blobPath: string): Promise<Buffer | null> {
    try {
      return await fs.readFile(this.resolve(jobId, blobPath));
    } catch (err: unknown) {
      if (isNotFound(err)) return null;
      throw new TransientInfraError(`Blob read failed for ${jobId}/${blobPath}`, { cause: String(err) });
    }
  }

  async list(jobId: string, prefix: string): Promise<string[]> {
    const base = this.resolve(jobId, prefix);
    const found: string[] = [];
    const walk = async (dir: string): Promise<void> => {
      let entries: Dirent[];
      try {
        entries = await fs.readdir(dir, { withFileTypes: true });
      } catch (err: unknown) {
        if (isNotFound(err)) return;
        throw err;
      }
      for (const entry of entries) {
        const full = path.join(dir, entry.name);
        if (entry.isDirectory()) await walk(full);
        else found.push(path.relative(base, full).split(path.sep).join('/'));
      }
    };
    await walk(base);
    return found.sort();
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

// ── Supabase Storage ──

export class SupabaseBlobStore implements BlobStore {
  constructor(
    private readonly db: SupabaseClient,
    private readonly bucket: string,
  ) {}

  private key(jobId: string, blobPath: string): string {
    assertJobId(jobId);
    return `${jobId}/${normalizeBlobPath(blobPath)}`;
  }

  async write(jobId: string, blobPath: string, bytes: Buffer): Promise<void> {
    const { error } = await this.db.storage
      .from(this.bucket)
      .upload(this.key(jobId, blobPath), bytes, { upsert: true, contentType: 'application/octet-stream' });
    if (error) throw new TransientInfraError(`Blob upload failed for ${jobId}/${blobPath}: ${error.message}`);
  }

  async read(jobId: string, blobPath: string): Promise<Buffer | null> {
    const { data, error } = await this.db.storage.from(this.bucket).download(this.key(jobId, blobPath));
    if (error) {
      if (/not.?found/i.test(error.message)) return null;
      throw new TransientInfraError(`Blob download failed for ${jobId}/${blobPath}: ${error.message}`);
    }
    return Buffer.from(await data.arrayBuffer());
  }

  async list(jobId: string, prefix: string): Promise<string[]> {
    const root = this.key(jobId, prefix);
    const found: string[] = [];
    const walk = async (dir: string, rel: string): Promise<void> => {
      const { data, error } = await this.db.storage.from(this.bucket).list(dir, { limit: 1000 });
      if (error) throw new TransientInfraError(`Blob list failed for ${dir}: ${error.message}`);
      for (const entry of data) {
        const childRel = rel ? `${rel}/${entry.name}` : entry.name;
        // Folders come back without metadata.
        if (!entry.metadata) await walk(`${dir}/${entry.name}`, childRel);
        else found.push(childRel);
      }
    };
    await walk(root, '');
    return found.sort();
  }
}
