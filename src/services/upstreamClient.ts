import { UpstreamError } from '../errors/index.js';
import type { Logger } from '../lib/logger.js';
import { UpstreamClient } from '../types/gateway.js';

export interface KeyedUpstreamConfig {
  apiKey: string;
  keyHeader: string;
  logger: Logger;
  fetchImpl?: typeof fetch;
}

/**
 * GETs upstream URLs with the process-held API key attached. Only responses
 * with status 200 are returned; everything else becomes an {@link UpstreamError}
 * and the upstream body is discarded. No retries.
 */
export class KeyedUpstreamClient implements UpstreamClient {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly config: KeyedUpstreamConfig) {
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  async fetch(url: URL): Promise<Response> {
    // Log origin and path only; query values are caller input.
    const target = `${url.origin}${url.pathname}`;
    this.config.logger.debug({ target }, 'proxying upstream request');

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'GET',
        headers: { [this.config.keyHeader]: this.config.apiKey },
      });
    } catch (error) {
      this.config.logger.warn({ target, reason: error instanceof Error ? error.message : String(error) }, 'upstream unreachable');
      throw new UpstreamError('Bad Gateway: upstream unreachable');
    }

    if (response.status !== 200) {
      this.config.logger.warn({ target, status: response.status }, 'upstream returned an error');
      await response.body?.cancel();
      throw new UpstreamError();
    }
    return response;
  }
}
