import 'reflect-metadata';

// Set test environment variables
process.env.NODE_ENV = 'test';

// Increase timeout for tests
jest.setTimeout(30000);
