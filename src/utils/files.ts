import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';

/**
 * Per-file scratch space. Nothing in it outlives one pipeline run.
 */
export interface WorkDirectory {
  root: string;
  attachments: string;
  parts: string;
  subtitles: string;
  encodes: string;
}

export async function createWorkDirectory(tmpDir: string): Promise<WorkDirectory> {
  const root = path.resolve(tmpDir, uuidv4());
  const work: WorkDirectory = {
    root,
    attachments: path.join(root, 'attach'),
    parts: path.join(root, 'parts'),
    subtitles: path.join(root, 'subtitles'),
    encodes: path.join(root, 'encodes'),
  };

  for (const dir of [work.attachments, work.parts, work.subtitles, work.encodes]) {
    await fs.promises.mkdir(dir, { recursive: true });
  }

  return work;
}

export async function removeWorkDirectory(work: WorkDirectory): Promise<void> {
  await fs.promises.rm(work.root, { recursive: true, force: true });
}

/**
 * Renames a file, falling back to copy and delete across devices
 */
export async function moveFile(source: string, destination: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(destination), { recursive: true });

  try {
    await fs.promises.rename(source, destination);
  } catch (error) {
    if (!(error instanceof Error) || !('code' in error) || error.code !== 'EXDEV') {
      throw error;
    }
    await fs.promises.copyFile(source, destination);
    await fs.promises.unlink(source);
  }
}

/**
 * Files directly inside a directory, in name order
 */
export async function listFiles(directory: string): Promise<string[]> {
  const entries = await fs.promises.readdir(directory, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile())
    .map((entry) => path.join(directory, entry.name))
    .sort();
}
