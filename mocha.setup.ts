// Loaded before any test file so the shared logger picks up the test environment.
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'error';
