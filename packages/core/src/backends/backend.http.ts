/**
 * GET a URL with a hard timeout. Resolves to null on any network failure,
 * timeout or non-2xx status so probes can treat the backend as unreachable.
 */
export async function getWithTimeout(url: string, timeoutMs: number): Promise<string | null> {
  try {
    const response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
    if (!response.ok) return null;
    return await response.text();
  } catch {
    return null;
  }
}

/** Parse a body as JSON, yielding undefined when it is not JSON. */
export function parseJsonBody(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}
