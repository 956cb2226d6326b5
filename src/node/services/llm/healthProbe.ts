/** Default liveness probe timeout */
export const DEFAULT_HEALTH_TIMEOUT_MS = 5000;

/** Health check against a running server; resolves to a boolean, never rejects. */
export type HealthProbe = () => Promise<boolean>;

/**
 * GET `<baseUrl>/health`. Only a 200 counts as healthy; network errors,
 * timeouts, malformed URLs and any other status all resolve to false.
 */
export async function probeHealth(
  baseUrl: string,
  timeoutMs: number = DEFAULT_HEALTH_TIMEOUT_MS
): Promise<boolean> {
  try {
    const url = new URL("/health", baseUrl);
    const resp = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
    // Release the socket; we only care about the status
    await resp.body?.cancel();
    return resp.status === 200;
  } catch {
    return false;
  }
}

export function localBaseUrl(port: number): string {
  return `http://127.0.0.1:${port}`;
}

export function createHealthProbe(port: number, timeoutMs?: number): HealthProbe {
  const baseUrl = localBaseUrl(port);
  return () => probeHealth(baseUrl, timeoutMs);
}
