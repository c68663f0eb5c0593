import { jest } from '@jest/globals';

// Keep engine logging out of the test output
global.console.error = jest.fn();
