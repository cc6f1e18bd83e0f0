import { promises as fs, type Dirent } from 'node:fs';
import path from 'node:path';
import type { Logger } from 'pino';
import { MANIFEST_EXTENSIONS } from '@/config/constants';
import { Failure, Success, type Result } from '@/types';
import { getErrorCode } from './errors';

/**
 * Check that the scan target exists and is a directory
 */
export async function validateTargetDirectory(targetPath: string): Promise<Result<string>> {
  const invalid = (reason: string): Result<string> =>
    Failure(`Target directory '${targetPath}' does not exist or is not a directory.`, {
      message: reason,
      hint: 'The target must be a directory containing Kubernetes manifests',
      resolution: 'Pass an existing directory with --target <path>',
      details: { target: targetPath },
    });

  try {
    const stats = await fs.stat(targetPath);
    return stats.isDirectory() ? Success(targetPath) : invalid('Target is not a directory');
  } catch (error) {
    const code = getErrorCode(error);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      return invalid('Target path does not exist');
    }
    if (code === 'EACCES') {
      return invalid('Permission denied while reading target path');
    }
    throw error;
  }
}

export function isManifestFile(fileName: string): boolean {
  return MANIFEST_EXTENSIONS.some((ext) => fileName.endsWith(ext));
}

async function isFileTarget(linkPath: string): Promise<boolean> {
  try {
    return (await fs.stat(linkPath)).isFile();
  } catch (error) {
    const code = getErrorCode(error);
    if (code === 'ENOENT' || code === 'ELOOP' || code === 'EACCES') {
      return false;
    }
    throw error;
  }
}

/**
 * Recursively collect every .yaml / .yml file under basePath.
 * Returned paths are joined onto basePath and sorted.
 * Symlinked directories are neither followed nor returned, and
 * subdirectories that cannot be read are skipped.
 */
export async function findManifestFiles(basePath: string, logger?: Logger): Promise<string[]> {
  const files: string[] = [];

  const readSubdirectory = async (dir: string): Promise<Dirent[]> => {
    try {
      return await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      const code = getErrorCode(error);
      if (code === 'EACCES' || code === 'EPERM' || code === 'ENOENT') {
        logger?.debug({ dir, code }, 'Skipping unreadable directory');
        return [];
      }
      throw error;
    }
  };

  const walk = async (entries: Dirent[], dir: string): Promise<void> => {
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(await readSubdirectory(fullPath), fullPath);
        continue;
      }
      if (!isManifestFile(entry.name)) continue;
      if (entry.isFile() || (entry.isSymbolicLink() && (await isFileTarget(fullPath)))) {
        files.push(fullPath);
      }
    }
  };

  await walk(await fs.readdir(basePath, { withFileTypes: true }), basePath);
  return files.sort();
}
