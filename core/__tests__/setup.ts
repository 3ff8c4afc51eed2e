import { beforeEach } from 'vitest';
import { debug } from '../src/utils/debug';

// Keep test output readable; individual tests re-enable logging when they assert on it.
beforeEach(() => {
  debug.configure({ enabled: false, persistLogs: false });
  debug.clearLogs();
});
