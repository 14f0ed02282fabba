// Keep test output readable; individual tests may lower this with setLogLevel.
process.env['LOG_LEVEL'] = process.env['LOG_LEVEL'] ?? 'error';
