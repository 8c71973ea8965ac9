import axios, { AxiosInstance } from 'axios';
import { NetworkError } from '../../shared/utils/errors';
import logger from '../../shared/utils/logger';
import { DeploymentRequest, RawResponse } from './deployment.types';

/**
 * Turns whatever axios handed back as data into the raw body text
 */
export function toRawBody(data: unknown): string {
  if (data === undefined || data === null) {
    return '';
  }
  if (typeof data === 'string') {
    return data;
  }
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  return JSON.stringify(data);
}

/**
 * Sends deployment requests to the model metadata service.
 * Every HTTP status is returned to the caller; only transport failures throw.
 */
export class DeploymentClient {
  private readonly http: AxiosInstance;

  constructor(http: AxiosInstance = axios.create()) {
    this.http = http;
  }

  async send(request: DeploymentRequest): Promise<RawResponse> {
    logger.debug('Sending deployment request', {
      action: request.action,
      method: request.method,
      url: request.url,
    });

    try {
      const response = await this.http.request<unknown>({
        method: request.method,
        url: request.url,
        data: request.body,
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        // Status and body are interpreted by the response classifier
        responseType: 'text',
        transformResponse: [(data: unknown) => data],
        validateStatus: () => true,
      });

      return {
        statusCode: response.status,
        rawBody: toRawBody(response.data),
      };
    } catch (error) {
      if (axios.isAxiosError(error)) {
        throw new NetworkError(request.url, error.message, error.code);
      }
      throw error;
    }
  }
}

export const deploymentClient = new DeploymentClient();
