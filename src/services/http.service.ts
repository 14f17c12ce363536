import axios, { type AxiosInstance } from 'axios';
import { HttpsProxyAgent } from 'https-proxy-agent';
import { TransportError } from '../errors.js';
import type { HttpRequestOptions, HttpResponse, HttpTransport, Logger, Relay } from '../types/index.js';
import { decodeBody } from '../utils/encoding.utils.js';

/**
 * The URL actually requested: prefix relays wrap the target, forward proxies
 * and direct calls leave it untouched.
 */
export function resolveRelayTarget(url: string, relay?: Relay): string {
  if (relay?.kind === 'prefix') {
    return relay.template.replace('{url}', encodeURIComponent(url));
  }
  return url;
}

class HttpService implements HttpTransport {
  private logger: Logger;
  private client: AxiosInstance;

  constructor(logger: Logger, client: AxiosInstance = axios.create()) {
    this.logger = logger;
    this.client = client;
  }

  async get(url: string, options: HttpRequestOptions): Promise<HttpResponse> {
    const { headers, timeoutMs, relay } = options;
    const target = resolveRelayTarget(url, relay);
    const agent = relay?.kind === 'proxy' ? new HttpsProxyAgent(relay.url) : undefined;

    this.logger.debug(`GET ${target}${relay ? ` via ${relay.id}` : ''} (timeout ${timeoutMs}ms)`);

    try {
      const response = await this.client.get<ArrayBuffer>(target, {
        headers,
        timeout: timeoutMs,
        signal: AbortSignal.timeout(timeoutMs),
        responseType: 'arraybuffer',
        httpAgent: agent,
        httpsAgent: agent,
        proxy: false,
        // status is judged by the caller
        validateStatus: () => true
      });

      const contentType = response.headers['content-type'];
      return {
        status: response.status,
        body: decodeBody(new Uint8Array(response.data), typeof contentType === 'string' ? contentType : undefined)
      };
    } catch (error) {
      if (axios.isAxiosError(error)) {
        throw new TransportError(`${error.code ?? 'ERR_NETWORK'}: ${error.message}`, { cause: error });
      }
      throw new TransportError(error instanceof Error ? error.message : String(error), { cause: error });
    }
  }
}

export default HttpService;
