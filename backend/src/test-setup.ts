/* eslint-disable no-console */
/**
 * Jest test setup file
 * Pins the environment before any module reads config and keeps test output quiet
 */

process.env.NODE_ENV = 'test';
process.env.HANDOFF_ENV = 'test';
process.env.DEFAULT_LOCALE = 'en';
process.env.STEAM_TIMEOUT_MS = '5000';
// Empty rather than deleted so a local .env cannot switch the password guard on.
process.env.IPC_PASSWORD = '';

const originalConsole = { ...console };

beforeAll(() => {
  // Suppress console output during tests unless explicitly enabled
  if (!process.env.DEBUG_TESTS) {
    console.log = jest.fn();
    console.debug = jest.fn();
    console.info = jest.fn();
    console.warn = jest.fn();
    console.error = jest.fn();
  }
});

afterAll(() => {
  Object.assign(console, originalConsole);
});
