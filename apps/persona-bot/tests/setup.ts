/**
 * Jest Test Setup
 */

// Read by CONFIG and the service container's log level
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';

jest.setTimeout(10000);

beforeEach(() => {
  jest.clearAllMocks();
});
