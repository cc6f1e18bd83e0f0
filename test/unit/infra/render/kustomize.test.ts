import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { DirResult } from 'tmp';

jest.mock('@/lib/process', () => {
  const actual = jest.requireActual<typeof import('@/lib/process')>('@/lib/process');
  return { ...actual, runCommand: jest.fn() };
});

import { runCommand } from '@/lib/process';
import { renderKustomize, summarizeManifest } from '@/infra/render/kustomize';
import { createManifestRenderer } from '@/infra/render/renderer';
import { createMockLogger } from '../../../__support__/utilities/mocks';
import { createTestTempDir } from '../../../__support__/utilities/tmp-helpers';
import { commandResult, commonErrors } from '../security/scanner-test-utils';

const mockRunCommand = jest.mocked(runCommand);

const RENDERED = `apiVersion: v1
kind: Service
metadata:
  name: web
---
apiVersion: apps/v1
kind: Deployment
metadata:
  name: web
---
apiVersion: v1
kind: Service
metadata:
  name: web-headless
`;

describe('kustomize renderer', () => {
  let testDir: DirResult;
  let cleanup: () => Promise<void>;
  const fixedClock = (): Date => new Date(2026, 9, 19, 14, 3, 9);

  beforeEach(() => {
    mockRunCommand.mockReset();
    const result = createTestTempDir('render-');
    testDir = result.dir;
    cleanup = result.cleanup;
  });

  afterEach(async () => {
    await cleanup();
  });

  describe('summarizeManifest', () => {
    it('should count documents and collect sorted distinct kinds', () => {
      expect(summarizeManifest(RENDERED)).toEqual({
        resourceCount: 3,
        kinds: ['Deployment', 'Service'],
      });
    });

    it('should skip empty documents', () => {
      expect(summarizeManifest('---\n---\nkind: ConfigMap\n')).toEqual({
        resourceCount: 1,
        kinds: ['ConfigMap'],
      });
    });
  });

  describe('renderKustomize', () => {
    it('should write kustomize output into a timestamped render directory', async () => {
      mockRunCommand
        .mockResolvedValueOnce(commandResult({ stdout: 'v5.4.2\n' }))
        .mockResolvedValueOnce(commandResult({ stdout: RENDERED }));
      const outputDir = path.join(testDir.name, 'rendered_output');

      const result = await renderKustomize('./overlays/prod', createMockLogger(), {
        outputDir,
        now: fixedClock,
      });

      const expectedPath = path.join(outputDir, 'render-20261019-140309', 'manifest.yaml');
      expect(result).toEqual({
        ok: true,
        value: { path: expectedPath, resourceCount: 3, kinds: ['Deployment', 'Service'] },
      });
      expect(await fs.readFile(expectedPath, 'utf-8')).toBe(RENDERED);
      expect(mockRunCommand).toHaveBeenLastCalledWith('kustomize', ['build', './overlays/prod'], {
        timeout: 120_000,
      });
    });

    it('should fail with stderr when kustomize build exits non-zero', async () => {
      mockRunCommand
        .mockResolvedValueOnce(commandResult({ stdout: 'v5.4.2' }))
        .mockResolvedValueOnce(
          commandResult({ exitCode: 1, stderr: 'Error: unable to find one of kustomization.yaml\n' }),
        );
      const outputDir = path.join(testDir.name, 'rendered_output');

      const result = await renderKustomize('./raw', createMockLogger(), { outputDir, now: fixedClock });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBe(
          'Kustomize rendering failed: Error: unable to find one of kustomization.yaml',
        );
      }
      await expect(fs.stat(outputDir)).rejects.toThrow();
    });

    it('should fail when kustomize is not installed', async () => {
      mockRunCommand.mockRejectedValueOnce(commonErrors.commandNotFound('kustomize'));

      const result = await renderKustomize('.', createMockLogger(), {
        outputDir: testDir.name,
      });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBe('Kustomize not installed or not in PATH');
        expect(result.guidance?.resolution).toBe(
          'Install Kustomize: https://kubectl.docs.kubernetes.io/installation/kustomize/',
        );
      }
      expect(mockRunCommand).toHaveBeenCalledTimes(1);
    });

    it('should still succeed when the rendered output is not parseable YAML', async () => {
      mockRunCommand
        .mockResolvedValueOnce(commandResult({ stdout: 'v5.4.2' }))
        .mockResolvedValueOnce(commandResult({ stdout: 'key: [unclosed\n' }));

      const result = await renderKustomize('.', createMockLogger(), {
        outputDir: testDir.name,
        now: fixedClock,
      });

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.resourceCount).toBe(0);
        expect(result.value.kinds).toEqual([]);
      }
    });
  });

  describe('createManifestRenderer', () => {
    it('should render with the configured executable', async () => {
      mockRunCommand
        .mockResolvedValueOnce(commandResult({ stdout: 'v5.4.2' }))
        .mockResolvedValueOnce(commandResult({ stdout: RENDERED }));

      const renderer = createManifestRenderer(createMockLogger(), {
        outputDir: testDir.name,
        executable: '/usr/local/bin/kustomize',
        now: fixedClock,
      });
      const result = await renderer.render('./base');

      expect(result.ok).toBe(true);
      expect(mockRunCommand.mock.calls.map((call) => call[0])).toEqual([
        '/usr/local/bin/kustomize',
        '/usr/local/bin/kustomize',
      ]);
    });

    it('should report the version on ping', async () => {
      mockRunCommand.mockResolvedValueOnce(
        commandResult({ stdout: '{Version:kustomize/v4.5.7 GitCommit:abc}' }),
      );

      const renderer = createManifestRenderer(createMockLogger());

      expect(await renderer.ping()).toEqual({ ok: true, value: '4.5.7' });
    });
  });
});
