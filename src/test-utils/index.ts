/**
 * Test Utilities Module
 *
 * Shared utilities for testing across the codebase.
 *
 * @example
 * ```typescript
 * import { resetAll, ScriptedEmbeddingProvider } from '../test-utils/index.js';
 *
 * beforeEach(() => {
 *   resetAll();
 * });
 * ```
 */

export { resetAll } from './reset.js';
export {
  ScriptedEmbeddingProvider,
  chainVectors,
  type ScriptedProviderOptions,
} from './providers.js';
