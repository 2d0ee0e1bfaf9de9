// Set test environment
process.env.NODE_ENV = 'test';
// Keep structured log lines out of test output unless asked for
process.env.LOG_LEVEL = process.env.TEST_LOG_LEVEL || 'silent';
// Never pick up a real generator key from the developer's shell
delete process.env.RECOMMENDER_API_KEY;
