import { afterEach, jest } from '@jest/globals';

// Logger output goes to stderr; keep test output quiet
global.console = {
  ...console,
  log: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
  info: jest.fn(),
  debug: jest.fn(),
};

afterEach(() => {
  jest.clearAllMocks();
});
