/**
 * Jest test setup file
 * Runs before each test file
 */

// Set test environment variables
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';
delete process.env.CRAWLER_CONFIG;
delete process.env.PLAYWRIGHT_CHROMIUM_EXECUTABLE;
