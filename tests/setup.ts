/**
 * Jest test setup file
 *
 * Runs before each test file, ahead of its imports.
 */

// Keep the console transport quiet unless a test asks for more
process.env['LOG_LEVEL'] ??= 'ERROR';

jest.setTimeout(30000);
