/** 每個對外請求的 timeout */
export const REQUEST_TIMEOUT_MS = 10000;

/**
 * 帶 timeout 的 fetch，逾時會以 AbortError 失敗
 */
export async function fetchWithTimeout(
  url: string,
  init: RequestInit = {},
  timeoutMs: number = REQUEST_TIMEOUT_MS
): Promise<Response> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await fetch(url, { ...init, signal: controller.signal });
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * 組出含 query string 的 URL
 */
export function withQuery(endpoint: string, params: Record<string, string>): string {
  const url = new URL(endpoint);
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, value);
  }
  return url.toString();
}

/**
 * 錯誤回應的 body 片段（換行壓成空白）
 */
export async function bodyPreview(response: Response, limit = 200): Promise<string> {
  const text = await response.text();
  return Array.from(text).slice(0, limit).join('').replace(/\n/g, ' ');
}
