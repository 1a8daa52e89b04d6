/**
 * Test setup and configuration
 */

// Set test environment before any config is read
process.env['NODE_ENV'] = 'test';
process.env['LOG_LEVEL'] = 'error';
process.env['API_ENABLED'] = 'false';
