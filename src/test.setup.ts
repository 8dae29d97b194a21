// Keep engine logs out of the test output; pino-pretty is not spawned under test.
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'silent';
