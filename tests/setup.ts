/**
 * Vitest Test Setup
 *
 * - IndexedDB comes from fake-indexeddb (Dexie.js under Node)
 * - fetch is stubbed so no test reaches the network; tests that exercise
 *   an HTTP client install their own stub
 */

import 'fake-indexeddb/auto';
import { vi, beforeEach, afterEach, afterAll } from 'vitest';

// ============================================
// Mock fetch
// ============================================

beforeEach(() => {
  vi.stubGlobal(
    'fetch',
    vi.fn().mockRejectedValue(new TypeError('fetch is disabled in tests'))
  );
});

// ============================================
// Test Lifecycle Hooks
// ============================================

afterEach(() => {
  vi.unstubAllGlobals();
  vi.clearAllMocks();
});

afterAll(() => {
  vi.restoreAllMocks();
});
