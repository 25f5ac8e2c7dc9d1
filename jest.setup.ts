/**
 * Jest setup file.
 * Tests inject their own HttpClient or fetchImpl; the global fetch is replaced
 * so nothing reaches the network by accident.
 */

globalThis.fetch = jest.fn(async () => {
  throw new Error('network access is disabled in tests');
});

export {};
