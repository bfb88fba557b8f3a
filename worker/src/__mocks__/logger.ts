import { vi } from 'vitest';

/**
 * Silent stand-in for the NestJS Logger
 */
export class MockLogger {
  static log = vi.fn();
  static error = vi.fn();
  static warn = vi.fn();
  static debug = vi.fn();
  static verbose = vi.fn();
  static fatal = vi.fn();

  log = vi.fn();
  error = vi.fn();
  warn = vi.fn();
  debug = vi.fn();
  verbose = vi.fn();
  fatal = vi.fn();

  constructor(readonly context?: string) {}
}
