import type { Logger } from 'pino';
import { Result, Success, Failure } from '@/types';
import {
  checkCheckovAvailability,
  runCheckovScan,
  type CheckovOptions,
  type CheckovScanResult,
} from './checkov-scanner';

export type { CheckovScanResult } from './checkov-scanner';

export interface PolicyScanner {
  scan: (scanPath: string) => Promise<Result<CheckovScanResult>>;
  ping: () => Promise<Result<string>>;
}

/**
 * Create a Checkov-based policy scanner
 */
export const createPolicyScanner = (logger: Logger, options: CheckovOptions = {}): PolicyScanner => {
  const log = logger.child({ component: 'scanner' });

  return {
    async scan(scanPath: string): Promise<Result<CheckovScanResult>> {
      return runCheckovScan(scanPath, log, options);
    },

    async ping(): Promise<Result<string>> {
      const result = await checkCheckovAvailability(log, options.executable);
      if (result.ok) {
        log.debug({ version: result.value }, 'Checkov scanner available');
        return Success(result.value);
      }
      return Failure(result.error, result.guidance);
    },
  };
};
