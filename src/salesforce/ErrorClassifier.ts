import axios from 'axios';
import { AuthenticationError, ConfigurationError, ErrorDisposition, ExtractionError } from '../model/PipelineError';

// Salesforce error codes that mean the session or login is unusable for every object.
const FATAL_ERROR_CODES = new Set([
  'INVALID_SESSION_ID',
  'INVALID_LOGIN',
  'INVALID_AUTH_HEADER',
  'INVALID_OPERATION_WITH_EXPIRED_PASSWORD',
  'LOGIN_MUST_USE_SECURITY_TOKEN',
  'API_DISABLED_FOR_ORG',
]);

// Errors that a retry of the same request will not fix.
const PERMANENT_ERROR_CODES = new Set([
  'INSUFFICIENT_ACCESS',
  'INSUFFICIENT_ACCESS_OR_READONLY',
  'INVALID_TYPE',
  'INVALID_FIELD',
  'MALFORMED_QUERY',
  'NOT_FOUND',
  'INVALID_QUERY_FILTER_OPERATOR',
]);

// jsforce raises SOAP login faults as plain errors whose message starts with the code.
const MESSAGE_CODE_PREFIX = /^([A-Z][A-Z_]+):/;

const FATAL_HTTP_STATUSES = new Set([401]);
const PERMANENT_HTTP_STATUSES = new Set([400, 403, 404]);

function errorCodeOf(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  if ('errorCode' in error && typeof error.errorCode === 'string') {
    return error.errorCode;
  }
  if ('message' in error && typeof error.message === 'string') {
    const match = MESSAGE_CODE_PREFIX.exec(error.message);
    if (match) {
      return match[1];
    }
  }
  if ('name' in error && typeof error.name === 'string') {
    return error.name;
  }
  return undefined;
}

function httpStatusOf(error: unknown): number | undefined {
  if (axios.isAxiosError(error)) {
    return error.response?.status;
  }
  if (typeof error === 'object' && error !== null && 'statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

/**
 * Decides whether a failed Salesforce call is worth another attempt.
 */
export function classifyError(error: unknown): ErrorDisposition {
  if (error instanceof ExtractionError) {
    return error.disposition;
  }
  if (error instanceof AuthenticationError) {
    return 'fatal';
  }
  if (error instanceof ConfigurationError) {
    return 'permanent';
  }

  const code = errorCodeOf(error);
  if (code !== undefined) {
    if (FATAL_ERROR_CODES.has(code)) {
      return 'fatal';
    }
    if (PERMANENT_ERROR_CODES.has(code)) {
      return 'permanent';
    }
  }

  const status = httpStatusOf(error);
  if (status !== undefined) {
    if (FATAL_HTTP_STATUSES.has(status)) {
      return 'fatal';
    }
    if (PERMANENT_HTTP_STATUSES.has(status)) {
      return 'permanent';
    }
  }
  return 'retryable';
}
