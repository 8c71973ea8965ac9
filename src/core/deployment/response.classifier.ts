import { HttpStatusError, ResponseParseError } from '../../shared/utils/errors';
import { DeploymentAction, DeploymentResult, RawResponse } from './deployment.types';

const ALREADY_EXISTS_PATTERN = /already exists/i;

export function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode <= 299;
}

/**
 * A register call for a model the service already knows about.
 * Matches 409 Conflict, or any 4xx whose body says "already exists".
 */
export function isAlreadyExists(action: DeploymentAction, response: RawResponse): boolean {
  if (action !== 'register') {
    return false;
  }
  if (response.statusCode === 409) {
    return true;
  }
  return (
    response.statusCode >= 400 &&
    response.statusCode <= 499 &&
    ALREADY_EXISTS_PATTERN.test(response.rawBody)
  );
}

/**
 * Parses a JSON body; an empty body yields null
 */
export function parseBody(url: string, response: RawResponse): unknown {
  if (response.rawBody.trim() === '') {
    return null;
  }

  try {
    return JSON.parse(response.rawBody);
  } catch (error) {
    throw new ResponseParseError(
      url,
      response.statusCode,
      response.rawBody,
      error instanceof Error ? error.message : String(error)
    );
  }
}

/**
 * Decides whether a response counts as a successful deployment.
 * Throws HttpStatusError or ResponseParseError when it does not.
 */
export function classifyResponse(
  action: DeploymentAction,
  url: string,
  response: RawResponse
): DeploymentResult {
  if (isSuccessStatus(response.statusCode)) {
    return {
      statusCode: response.statusCode,
      body: parseBody(url, response),
      success: true,
      alreadyExists: false,
    };
  }

  if (isAlreadyExists(action, response)) {
    let body: unknown;
    try {
      body = parseBody(url, response);
    } catch {
      // Conflict bodies are informational only
      body = response.rawBody;
    }
    return {
      statusCode: response.statusCode,
      body,
      success: true,
      alreadyExists: true,
    };
  }

  throw new HttpStatusError(url, response.statusCode, response.rawBody);
}
