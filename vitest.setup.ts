/**
 * Shared Vitest setup.
 *
 * Unit tests assert on returned warnings rather than on log output, so the
 * logger is silenced unless a test (or the developer) opts back in.
 */

import { beforeAll } from 'vitest';

const SETUP_LOGGED = Symbol.for('release-scribe.setup-logged');
const RELEASE_SCRIBE_TEST_MODE = process.env.RELEASE_SCRIBE_TEST_MODE ?? 'unit';

if (!process.env.RELEASE_SCRIBE_LOG_LEVEL) {
  process.env.RELEASE_SCRIBE_LOG_LEVEL = 'silent';
}

beforeAll(() => {
  if (Reflect.get(globalThis, SETUP_LOGGED) === true) return;
  Reflect.set(globalThis, SETUP_LOGGED, true);
  if (process.env.VITEST_QUIET !== 'true') {
    console.log(`[vitest.setup] Test mode: ${RELEASE_SCRIBE_TEST_MODE}`);
  }
});

