/**
 * Test Utilities - Unified Reset
 *
 * Provides a single function to reset cached module state for test isolation.
 *
 * @example
 * ```typescript
 * import { resetAll } from '../test-utils/index.js';
 *
 * beforeEach(() => {
 *   resetAll();
 *   vi.clearAllMocks();
 * });
 * ```
 */

import { _clearEnvCache } from '../config/env.js';

/**
 * Reset all cached module state.
 *
 * Currently that is the environment cache, so tests that stub
 * `process.env` see their own values.
 */
export function resetAll(): void {
  _clearEnvCache();
}
