// Test setup file for vitest

process.env.NODE_ENV = 'test';

// Suppress noisy logs during tests
process.env.LOG_LEVEL = 'error';
delete process.env.LOKI_URL;
