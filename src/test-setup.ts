import { afterEach, vi } from 'vitest';

// Mock call history, env stubs and fake timers never carry over between tests.
afterEach(() => {
  vi.clearAllMocks();
  vi.unstubAllEnvs();
  vi.useRealTimers();
});
