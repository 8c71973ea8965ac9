/**
 * Base application error class that extends the native Error class
 * All custom errors will inherit from this class
 */
export class AppError extends Error {
  isOperational: boolean;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
    this.isOperational = true; // Indicates it's a known operational error

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);

    // Set the prototype explicitly for better TypeScript compatibility
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

/**
 * Invalid command line usage, config file or environment
 */
export class ConfigurationError extends AppError {
  readonly issues: string[];

  constructor(message: string = 'Invalid configuration', issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message);
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Base class for failures of a single deployment request
 */
export class DeploymentError extends AppError {
  readonly url: string;

  constructor(message: string, url: string) {
    super(message);
    this.url = url;
    Object.setPrototypeOf(this, DeploymentError.prototype);
  }
}

/**
 * No response was received from the endpoint (refused, DNS failure, timeout, abort)
 */
export class NetworkError extends DeploymentError {
  readonly code: string | undefined;

  constructor(url: string, detail: string, code?: string) {
    super(`Unable to reach ${url}: ${detail}`, url);
    this.code = code;
    Object.setPrototypeOf(this, NetworkError.prototype);
  }
}

/**
 * The endpoint answered with a status that is not treated as success
 */
export class HttpStatusError extends DeploymentError {
  readonly statusCode: number;
  readonly responseBody: string;

  constructor(url: string, statusCode: number, responseBody: string) {
    super(`Request to ${url} failed with status ${statusCode}: ${responseBody || '<empty>'}`, url);
    this.statusCode = statusCode;
    this.responseBody = responseBody;
    Object.setPrototypeOf(this, HttpStatusError.prototype);
  }
}

/**
 * A successful response carried a body that is not valid JSON
 */
export class ResponseParseError extends DeploymentError {
  readonly statusCode: number;
  readonly responseBody: string;

  constructor(url: string, statusCode: number, responseBody: string, detail: string) {
    super(`Failed to parse JSON response from ${url}: ${detail}`, url);
    this.statusCode = statusCode;
    this.responseBody = responseBody;
    Object.setPrototypeOf(this, ResponseParseError.prototype);
  }
}
