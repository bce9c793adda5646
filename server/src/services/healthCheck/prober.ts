/**
 * Provider Liveness Probe
 *
 * One bounded GET against `{endpoint}/health`. Any 2xx answer is healthy;
 * everything else (transport error, timeout, non-2xx) is unhealthy. The
 * probe never throws: the cause is returned for logging only.
 */

import { createLogger } from '../../utils/logger';
import { getErrorMessage } from '../../utils/errors';

const log = createLogger('PROBE');

export interface ProbeOptions {
  timeoutMs: number;
  /** Aborts the request early, e.g. on monitor shutdown */
  signal?: AbortSignal;
}

export interface ProbeResult {
  healthy: boolean;
  url: string;
  statusCode?: number;
  error?: string;
  latencyMs: number;
  /** True when the external signal, not the timeout, ended the probe */
  aborted: boolean;
}

export type Prober = (endpoint: string, options: ProbeOptions) => Promise<ProbeResult>;

/**
 * Health URL for a provider endpoint: trailing slashes stripped, `/health`
 * appended
 */
export function buildHealthUrl(endpoint: string): string {
  return `${endpoint.replace(/\/+$/, '')}/health`;
}

export function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

export const probeProvider: Prober = async (endpoint, { timeoutMs, signal }) => {
  const url = buildHealthUrl(endpoint);
  const startedAt = Date.now();
  const controller = new AbortController();
  let timedOut = false;

  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onAbort = () => controller.abort();

  if (signal?.aborted) {
    controller.abort();
  } else {
    signal?.addEventListener('abort', onAbort, { once: true });
  }

  try {
    const response = await fetch(url, {
      method: 'GET',
      headers: { Accept: 'application/json' },
      signal: controller.signal,
    });

    const healthy = isSuccessStatus(response.status);

    // Only the status code matters; release the connection
    try {
      await response.body?.cancel();
    } catch (error) {
      log.debug('Failed to discard health response body (non-critical)', { url, error: getErrorMessage(error) });
    }

    return {
      healthy,
      url,
      statusCode: response.status,
      error: healthy ? undefined : `status code ${response.status}`,
      latencyMs: Date.now() - startedAt,
      aborted: false,
    };
  } catch (error) {
    const aborted = !timedOut && signal?.aborted === true;
    return {
      healthy: false,
      url,
      error: timedOut ? `timed out after ${timeoutMs}ms` : getErrorMessage(error),
      latencyMs: Date.now() - startedAt,
      aborted,
    };
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', onAbort);
  }
};
