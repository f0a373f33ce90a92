/**
 * Checks that the temp-dir cleanup is wired into the Vitest run
 *
 * @module tests/unit/test-setup
 */

import { describe, it, expect } from 'vitest';
import config from '../../vitest.config.js';
import * as globalTeardown from '../global-teardown.js';

describe('vitest configuration', () => {
  it('should load the temp-dir cleanup as a global setup file', () => {
    expect(config.test?.globalSetup).toEqual(['./tests/global-teardown.ts']);
  });

  it('should export the teardown hook Vitest calls after the run', () => {
    expect(typeof globalTeardown.teardown).toBe('function');
  });
});
