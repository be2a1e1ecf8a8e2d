process.env.NODE_ENV = 'test';
// Skips are logged at warn; keep test output to real failures
process.env.LOG_LEVEL = process.env.TEST_LOG_LEVEL ?? 'error';
delete process.env.ORGANIZER_SOURCE_DIR;
delete process.env.ORGANIZER_CONFIG;
