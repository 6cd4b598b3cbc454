/**
 * Jest setup file for EC2 compute tests
 * @format
 */

// Increase timeout for CDK synthesis operations
jest.setTimeout(30000);

// Suppress CDK synthesis output noise in test logs
process.env.CDK_DEBUG = 'false';

// Keep factory console summaries out of test output
jest.spyOn(console, 'log').mockImplementation(() => undefined);
