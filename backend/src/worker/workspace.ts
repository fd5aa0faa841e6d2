/**
 * Local job directories on the worker: <workDir>/jobs/<jobId>/{input,output}.
 * Inputs are fetched from the controller before launch; outputs are read back after exit.
 */

import { promises as fs, type Dirent } from 'fs';
import path from 'path';
import { normalizeBlobPath } from '../services/blob-store.js';
import type { ControllerClient } from './controller-client.js';

export interface JobDirs {
  root: string;
  inputDir: string;
  outputDir: string;
}

export class Workspace {
  constructor(
    private readonly workDir: string,
    private readonly client: ControllerClient,
  ) {}

  dirs(jobId: string): JobDirs {
    const root = path.resolve(this.workDir, 'jobs', jobId);
    return { root, inputDir: path.join(root, 'input'), outputDir: path.join(root, 'output') };
  }

  async prepare(jobId: string, inputPaths: string[]): Promise<JobDirs> {
    const dirs = this.dirs(jobId);
    await fs.mkdir(dirs.inputDir, { recursive: true });
    await fs.mkdir(dirs.outputDir, { recursive: true });
    // The container user may not be root.
    await fs.chmod(dirs.outputDir, 0o777);
    for (const inputPath of inputPaths) {
      const rel = normalizeBlobPath(inputPath);
      const content = await this.client.fetchInput(jobId, rel);
      const target = path.join(dirs.inputDir, rel);
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, content);
    }
    return dirs;
  }

  /** Relative paths of every file the job wrote to its output directory. */
  async outputs(jobId: string): Promise<string[]> {
    const base = this.dirs(jobId).outputDir;
    const found: string[] = [];
    const walk = async (dir: string): Promise<void> => {
      let entries: Dirent[];
      try {
        entries = await fs.readdir(dir, { withFileTypes: true });
      } catch (err: unknown) {
        if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return;
        throw err;
      }
      for (const entry of entries) {
        const full = path.join(dir, entry.name);
        if (entry.isDirectory()) await walk(full);
        else if (entry.isFile()) found.push(path.relative(base, full).split(path.sep).join('/'));
      }
    };
    await walk(base);
    return found.sort();
  }

  async readOutput(jobId: string, rel: string): Promise<Buffer> {
    return fs.readFile(path.join(this.dirs(jobId).outputDir, normalizeBlobPath(rel)));
  }

  async cleanup(jobId: string): Promise<void> {
    await fs.rm(this.dirs(jobId).root, { recursive: true, force: true });
  }
}
