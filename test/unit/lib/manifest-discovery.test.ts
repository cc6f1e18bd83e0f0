import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { DirResult } from 'tmp';
import {
  findManifestFiles,
  isManifestFile,
  validateTargetDirectory,
} from '@/lib/manifest-discovery';
import { createMockLogger } from '../../__support__/utilities/mocks';
import { createTestTempDir, writeTree } from '../../__support__/utilities/tmp-helpers';

describe('manifest discovery', () => {
  let testDir: DirResult;
  let cleanup: () => Promise<void>;

  beforeEach(() => {
    const result = createTestTempDir('discovery-');
    testDir = result.dir;
    cleanup = result.cleanup;
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await cleanup();
  });

  describe('validateTargetDirectory', () => {
    it('should accept an existing directory', async () => {
      const result = await validateTargetDirectory(testDir.name);

      expect(result).toEqual({ ok: true, value: testDir.name });
    });

    it('should reject a path that does not exist', async () => {
      const missing = path.join(testDir.name, 'missing');

      const result = await validateTargetDirectory(missing);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBe(
          `Target directory '${missing}' does not exist or is not a directory.`,
        );
        expect(result.guidance?.message).toBe('Target path does not exist');
      }
    });

    it('should reject a regular file', async () => {
      const file = path.join(testDir.name, 'deployment.yaml');
      await fs.writeFile(file, 'kind: Deployment\n');

      const result = await validateTargetDirectory(file);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.guidance?.message).toBe('Target is not a directory');
      }
    });

    it('should reject a path below a regular file', async () => {
      const file = path.join(testDir.name, 'plain.txt');
      await fs.writeFile(file, 'x');

      const result = await validateTargetDirectory(path.join(file, 'child'));

      expect(result.ok).toBe(false);
    });
  });

  describe('isManifestFile', () => {
    it.each([
      ['deployment.yaml', true],
      ['service.yml', true],
      ['kustomization.yaml', true],
      ['values.json', false],
      ['README.md', false],
      ['deployment.yaml.bak', false],
      ['DEPLOYMENT.YAML', false],
    ])('%s -> %s', (fileName, expected) => {
      expect(isManifestFile(fileName)).toBe(expected);
    });
  });

  describe('findManifestFiles', () => {
    it('should return all and only yaml files recursively, sorted', async () => {
      await writeTree(testDir.name, {
        'kustomization.yaml': 'resources: []\n',
        'base/deployment.yaml': 'kind: Deployment\n',
        'base/service.yml': 'kind: Service\n',
        'base/notes.txt': 'not a manifest',
        'overlays/prod/patch.yaml': 'kind: Deployment\n',
        'overlays/prod/values.json': '{}',
        'README.md': '# docs',
      });

      const files = await findManifestFiles(testDir.name);

      expect(files).toEqual([
        path.join(testDir.name, 'base/deployment.yaml'),
        path.join(testDir.name, 'base/service.yml'),
        path.join(testDir.name, 'kustomization.yaml'),
        path.join(testDir.name, 'overlays/prod/patch.yaml'),
      ]);
    });

    it('should return an empty list for a directory without manifests', async () => {
      await writeTree(testDir.name, { 'docs/index.md': '# nothing here' });

      expect(await findManifestFiles(testDir.name)).toEqual([]);
    });

    it('should not return directories whose names end in .yaml', async () => {
      await writeTree(testDir.name, { 'charts.yaml/inner.txt': 'x' });

      expect(await findManifestFiles(testDir.name)).toEqual([]);
    });

    it('should not return a symlink named .yaml that points to a directory', async () => {
      await writeTree(testDir.name, { 'real/inner.txt': 'x' });
      await fs.symlink(path.join(testDir.name, 'real'), path.join(testDir.name, 'linked.yaml'));

      expect(await findManifestFiles(testDir.name)).toEqual([]);
    });

    it('should not follow symlinked directories', async () => {
      const outside = createTestTempDir('discovery-outside-');
      try {
        await writeTree(outside.dir.name, { 'deployment.yaml': 'kind: Deployment\n' });
        await fs.symlink(outside.dir.name, path.join(testDir.name, 'shared'));

        expect(await findManifestFiles(testDir.name)).toEqual([]);
      } finally {
        await outside.cleanup();
      }
    });

    it('should return symlinks to manifest files and skip dangling ones', async () => {
      await writeTree(testDir.name, { 'source/deployment.txt': 'kind: Deployment\n' });
      await fs.symlink(
        path.join(testDir.name, 'source/deployment.txt'),
        path.join(testDir.name, 'deployment.yaml'),
      );
      await fs.symlink(path.join(testDir.name, 'missing.txt'), path.join(testDir.name, 'dangling.yml'));

      expect(await findManifestFiles(testDir.name)).toEqual([path.join(testDir.name, 'deployment.yaml')]);
    });

    it('should skip a subdirectory that cannot be read', async () => {
      await writeTree(testDir.name, {
        'app/deployment.yaml': 'kind: Deployment\n',
        'locked/secret.yaml': 'kind: Secret\n',
      });
      const locked = path.join(testDir.name, 'locked');
      const realReaddir = fs.readdir.bind(fs);
      const readdirWithLockedDir = async (dir: string, options: { withFileTypes: true }) => {
        if (dir === locked) {
          throw Object.assign(new Error(`EACCES: permission denied, scandir '${locked}'`), {
            code: 'EACCES',
          });
        }
        return realReaddir(dir, options);
      };
      jest.spyOn(fs, 'readdir').mockImplementation(readdirWithLockedDir as unknown as typeof fs.readdir);
      const logger = createMockLogger();

      const files = await findManifestFiles(testDir.name, logger);

      expect(files).toEqual([path.join(testDir.name, 'app/deployment.yaml')]);
      expect(logger.debug).toHaveBeenCalledWith(
        { dir: locked, code: 'EACCES' },
        'Skipping unreadable directory',
      );
    });

    it('should fail when the base directory itself cannot be read', async () => {
      await expect(findManifestFiles(path.join(testDir.name, 'missing'))).rejects.toThrow(/ENOENT/);
    });
  });
});
