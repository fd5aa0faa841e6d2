import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { ValidationError } from '../errors.js';
import { FsBlobStore, normalizeBlobPath } from '../services/blob-store.js';

describe('Blob Store', () => {
  describe('normalizeBlobPath', () => {
    it('should collapse empty and dot segments', () => {
      expect(normalizeBlobPath('data//./train.csv')).toBe('data/train.csv');
    });

    it('should reject paths that leave the job directory', () => {
      expect(() => normalizeBlobPath('../secrets')).toThrow(ValidationError);
      expect(() => normalizeBlobPath('data/../../x')).toThrow(ValidationError);
      expect(() => normalizeBlobPath('/etc/passwd')).toThrow('Invalid path "/etc/passwd": must be relative and non-empty');
      expect(() => normalizeBlobPath('./')).toThrow(ValidationError);
      expect(() => normalizeBlobPath('bad name.txt')).toThrow('Invalid path "bad name.txt"');
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // FsBlobStore
  // ═══════════════════════════════════════════════════════════════════════════
  describe('FsBlobStore', () => {
    let root: string;
    let store: FsBlobStore;

    beforeEach(async () => {
      root = await fs.mkdtemp(path.join(os.tmpdir(), 'blob-store-'));
      store = new FsBlobStore(root);
    });

    afterEach(async () => {
      await fs.rm(root, { recursive: true, force: true });
    });

    it('should write under the job directory and read it back', async () => {
      await store.write('job-001', 'input/main.py', Buffer.from('print("hi")'));

      expect((await store.read('job-001', 'input/main.py'))?.toString()).toBe('print("hi")');
      expect(await fs.readFile(path.join(root, 'jobs', 'job-001', 'input', 'main.py'), 'utf8')).toBe('print("hi")');
    });

    it('should return null for a missing blob', async () => {
      expect(await store.read('job-001', 'output/none.bin')).toBeNull();
    });

    it('should list nested files under a prefix', async () => {
      await store.write('job-001', 'output/model.pt', Buffer.from('w'));
      await store.write('job-001', 'output/plots/loss.png', Buffer.from('p'));
      await store.write('job-001', 'input/main.py', Buffer.from('m'));

      expect(await store.list('job-001', 'output')).toEqual(['model.pt', 'plots/loss.png']);
      expect(await store.list('job-002', 'output')).toEqual([]);
    });

    it('should refuse job ids that are not a single path segment', async () => {
      await expect(store.write('../job', 'input/x', Buffer.from('x'))).rejects.toThrow('Invalid job id "../job"');
    });
  });
});
