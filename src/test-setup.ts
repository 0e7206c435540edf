// Test setup - runs before every test file

// Keep test output readable; tests that assert on log lines set LOG_LEVEL themselves
process.env.LOG_LEVEL = process.env.TEST_LOG_LEVEL || 'silent';
process.env.NODE_ENV = 'test';
