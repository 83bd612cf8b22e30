import { vi } from 'vitest';
import type { ILogger } from '@everly/types';

/**
 * Mock Pino-compatible logger for testing.
 *
 * `child()` returns the same instance, so assertions on the root mock see
 * entries logged through module children too.
 */
export class MockLogger implements ILogger {
    public fatal = vi.fn();
    public error = vi.fn();
    public warn = vi.fn();
    public info = vi.fn();
    public debug = vi.fn();
    public trace = vi.fn();
    public child = vi.fn((_bindings: Record<string, unknown>): ILogger => this);
}
