export interface FetchTextResult {
  ok: boolean;
  status: number;
  raw: string;
}

/**
 * fetch with a timeout; an external signal aborts the request too. Network
 * faults come back as status 0 with the error message in `raw`.
 */
export async function fetchText(
  url: string,
  init: {
    method?: 'GET' | 'POST';
    headers?: Record<string, string>;
    body?: string;
    timeoutMs: number;
    signal?: AbortSignal;
  },
): Promise<FetchTextResult> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), init.timeoutMs);
  const onAbort = (): void => controller.abort();
  init.signal?.addEventListener('abort', onAbort, { once: true });

  try {
    const res = await fetch(url, {
      method: init.method ?? 'GET',
      headers: init.headers,
      body: init.body,
      signal: controller.signal,
    });
    return { ok: res.ok, status: res.status, raw: await res.text() };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, status: 0, raw: message };
  } finally {
    clearTimeout(timeout);
    init.signal?.removeEventListener('abort', onAbort);
  }
}

export function describeUrl(url: string): string {
  try {
    const parsed = new URL(url);
    return `host=${parsed.hostname} path=${parsed.pathname.slice(0, 48)}`;
  } catch {
    return `url=${url.slice(0, 80)}`;
  }
}
