export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export const fetchWithTimeout = (
  fetchFn: FetchLike,
  url: string,
  timeoutMs: number
): Promise<Response> =>
  fetchFn(url, timeoutMs > 0 ? { signal: AbortSignal.timeout(timeoutMs) } : undefined);
