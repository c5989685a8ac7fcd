import { TransientNetworkError } from '../../domain/errors/DomainErrors.js';

export type FetchFn = typeof fetch;

/**
 * 帶逾時的 fetch；連線失敗與逾時轉成 TransientNetworkError，
 * 其餘狀態碼交給呼叫端判斷。
 */
export async function httpRequest(
  fetchFn: FetchFn,
  url: string,
  init: RequestInit,
  timeoutMs: number,
): Promise<Response> {
  try {
    return await fetchFn(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
  } catch (err) {
    if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
      throw new TransientNetworkError(`Request to ${url} timed out after ${timeoutMs}ms`, { cause: err });
    }
    if (err instanceof TypeError) {
      throw new TransientNetworkError(`Connection error while requesting ${url}: ${err.message}`, { cause: err });
    }
    throw err;
  }
}

export function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
