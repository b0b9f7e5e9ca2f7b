import got, { RequestError, type Got } from 'got';
import { TransportError, type HttpTransport, type TransportRequest, type TransportResponse } from './types.js';

/**
 * GotTransport — HttpTransport on top of got.
 *
 * got's own retry is disabled (the dispatcher owns retries) and HTTP errors
 * resolve as ordinary responses so the classifier sees every status code.
 * Bodies come back as text; JSON decoding happens in the dispatcher so that
 * an empty 204 or an HTML error page never throws here.
 */
export class GotTransport implements HttpTransport {
  private readonly instance: Got;

  constructor(userAgent = 'teamleader-api-core') {
    this.instance = got.extend({
      headers: {
        'User-Agent': userAgent,
        'Accept': 'application/json',
      },
      retry: { limit: 0 },
      throwHttpErrors: false,
      followRedirect: false,
    });
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    try {
      const response = await this.instance(request.url, {
        method: request.method,
        headers: request.headers,
        json: request.json,
        form: request.form,
        timeout: { request: request.timeoutMs },
        responseType: 'text',
      });

      return {
        status: response.statusCode,
        headers: response.headers,
        body: response.body,
      };
    } catch (error) {
      if (error instanceof RequestError) {
        throw new TransportError(error.message, error.code, { cause: error });
      }
      throw error;
    }
  }
}
