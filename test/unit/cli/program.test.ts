import { describe, it, expect } from '@jest/globals';
import { createProgram, parseCliOptions, readPackageInfo } from '@/cli/program';

const argv = (...args: string[]): string[] => ['node', 'kube-manifest-scan', ...args];

describe('CLI program', () => {
  describe('createProgram', () => {
    it('should define every scan flag', () => {
      const flags = createProgram('0.0.0').options.map((option) => option.long);

      expect(flags).toEqual(
        expect.arrayContaining([
          '--target',
          '--dry-run',
          '--debug',
          '--render-only',
          '--render',
          '--output-dir',
          '--render-dir',
          '--health-check',
        ]),
      );
    });

    it('should read its version from package.json', () => {
      expect(readPackageInfo()).toEqual(
        expect.objectContaining({ name: 'kube-manifest-scan', version: expect.any(String) }),
      );
    });
  });

  describe('parseCliOptions', () => {
    it('should parse a plain scan with defaults', () => {
      const result = parseCliOptions(argv('--target', './k8s'), createProgram('0.0.0'));

      expect(result).toEqual({
        ok: true,
        value: {
          command: 'scan',
          debug: false,
          scan: { target: './k8s', dryRun: false, renderOnly: false, render: false },
        },
      });
    });

    it('should map every toggle', () => {
      const result = parseCliOptions(
        argv('--target', 'overlays/prod', '--dry-run', '--debug', '--render-only', '--render'),
        createProgram('0.0.0'),
      );

      expect(result).toEqual({
        ok: true,
        value: {
          command: 'scan',
          debug: true,
          scan: { target: 'overlays/prod', dryRun: true, renderOnly: true, render: true },
        },
      });
    });

    it('should carry output directory overrides', () => {
      const result = parseCliOptions(
        argv('--target', 'k8s', '--output-dir', 'reports', '--render-dir', 'tmp/rendered'),
        createProgram('0.0.0'),
      );

      expect(result.ok).toBe(true);
      if (result.ok && result.value.command === 'scan') {
        expect(result.value.outputDir).toBe('reports');
        expect(result.value.renderDir).toBe('tmp/rendered');
      }
    });

    it('should reject a missing target', () => {
      const result = parseCliOptions(argv('--dry-run'), createProgram('0.0.0'));

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBe('Missing required option --target <path>');
      }
    });

    it('should reject a blank target', () => {
      const result = parseCliOptions(argv('--target', '   '), createProgram('0.0.0'));

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBe('Invalid command-line options');
        expect(result.guidance?.message).toBe('target: Target path cannot be empty');
      }
    });

    it('should not require a target for the health check', () => {
      const result = parseCliOptions(argv('--health-check'), createProgram('0.0.0'));

      expect(result).toEqual({ ok: true, value: { command: 'health-check', debug: false } });
    });
  });
});
