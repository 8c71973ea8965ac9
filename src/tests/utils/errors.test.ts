import { describe, test, expect } from '@jest/globals';
import {
  AppError,
  ConfigurationError,
  DeploymentError,
  HttpStatusError,
  NetworkError,
  ResponseParseError,
} from '../../shared/utils/errors';

const URL_UNDER_TEST = 'https://meta.example.test/v1/models/register';

describe('Error Classes', () => {
  describe('AppError', () => {
    test('should create AppError with message', () => {
      const error = new AppError('Test error message');

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(AppError);
      expect(error.message).toBe('Test error message');
      expect(error.name).toBe('AppError');
      expect(error.isOperational).toBe(true);
      expect(error.stack).toContain('Test error message');
    });
  });

  describe('ConfigurationError', () => {
    test('should use the default message', () => {
      const error = new ConfigurationError();

      expect(error).toBeInstanceOf(AppError);
      expect(error.message).toBe('Invalid configuration');
      expect(error.issues).toEqual([]);
    });

    test('should append issues to the message', () => {
      const error = new ConfigurationError('Invalid environment', ['A: bad', 'B: worse']);

      expect(error.message).toBe('Invalid environment: A: bad; B: worse');
      expect(error.name).toBe('ConfigurationError');
    });
  });

  describe('NetworkError', () => {
    test('should name the unreachable endpoint', () => {
      const error = new NetworkError(URL_UNDER_TEST, 'socket hang up', 'ECONNRESET');

      expect(error).toBeInstanceOf(DeploymentError);
      expect(error).toBeInstanceOf(NetworkError);
      expect(error.message).toBe(`Unable to reach ${URL_UNDER_TEST}: socket hang up`);
      expect(error.code).toBe('ECONNRESET');
      expect(error.url).toBe(URL_UNDER_TEST);
    });
  });

  describe('HttpStatusError', () => {
    test('should include status code and body in the message', () => {
      const error = new HttpStatusError(URL_UNDER_TEST, 500, '{"detail":"boom"}');

      expect(error).toBeInstanceOf(DeploymentError);
      expect(error.message).toBe(`Request to ${URL_UNDER_TEST} failed with status 500: {"detail":"boom"}`);
      expect(error.statusCode).toBe(500);
      expect(error.responseBody).toBe('{"detail":"boom"}');
    });

    test('should mark an empty body', () => {
      expect(new HttpStatusError(URL_UNDER_TEST, 404, '').message).toBe(
        `Request to ${URL_UNDER_TEST} failed with status 404: <empty>`
      );
    });
  });

  describe('ResponseParseError', () => {
    test('should keep the raw body', () => {
      const error = new ResponseParseError(URL_UNDER_TEST, 200, 'OK', 'Unexpected token');

      expect(error).toBeInstanceOf(DeploymentError);
      expect(error.name).toBe('ResponseParseError');
      expect(error.message).toBe(`Failed to parse JSON response from ${URL_UNDER_TEST}: Unexpected token`);
      expect(error.responseBody).toBe('OK');
    });
  });
});
