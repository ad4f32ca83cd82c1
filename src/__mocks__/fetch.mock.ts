import { vi, type Mock } from 'vitest';

export type FetchMock = Mock<typeof fetch>;

/** Installs a `fetch` stub for the current test. Restored by `vi.unstubAllGlobals()`. */
export function createFetchMock(): FetchMock {
  const fetchMock = vi.fn<typeof fetch>();
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}
