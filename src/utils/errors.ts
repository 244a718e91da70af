// This module provides a typed application error that can be mapped into JSON-RPC and agent responses.

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: unknown;

  public constructor(statusCode: number, code: string, message: string, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

export type ErrorType =
  | 'ParseError'
  | 'ProtocolValidationError'
  | 'MethodNotFound'
  | 'InvalidParams'
  | 'ToolExecutionError'
  | 'ResourceReadError'
  | 'UpstreamProviderError'
  | 'AuthenticationError'
  | 'InternalError';

export type ToolFailureKind = 'validation' | 'network' | 'parse' | 'timeout' | 'unexpected';

// This table assigns every deliberately raised error code to one public taxonomy bucket.
const ERROR_TYPES: Record<string, ErrorType> = {
  invalid_json: 'ParseError',
  invalid_request: 'ProtocolValidationError',
  unrecognized_request: 'ProtocolValidationError',
  method_not_found: 'MethodNotFound',
  subscriptions_unsupported: 'MethodNotFound',
  tool_not_found: 'MethodNotFound',
  validation_error: 'InvalidParams',
  invalid_params: 'InvalidParams',
  tool_network_error: 'ToolExecutionError',
  tool_parse_error: 'ToolExecutionError',
  tool_timeout: 'ToolExecutionError',
  tool_not_configured: 'ToolExecutionError',
  tool_execution_failed: 'ToolExecutionError',
  resource_not_found: 'ResourceReadError',
  resource_read_failed: 'ResourceReadError',
  resource_timeout: 'ResourceReadError',
  unsupported_resource_scheme: 'ResourceReadError',
  upstream_provider_error: 'UpstreamProviderError',
  upstream_network_error: 'UpstreamProviderError',
  upstream_parse_error: 'UpstreamProviderError',
  upstream_timeout: 'UpstreamProviderError',
  missing_api_key: 'AuthenticationError'
};

const TOOL_FAILURE_KINDS: Record<string, ToolFailureKind> = {
  validation_error: 'validation',
  invalid_params: 'validation',
  tool_network_error: 'network',
  tool_not_configured: 'network',
  resource_read_failed: 'network',
  tool_parse_error: 'parse',
  tool_timeout: 'timeout',
  resource_timeout: 'timeout'
};

// This helper normalizes unknown failures into an AppError without leaking internals.
export function normalizeError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(500, 'internal_error', error.message);
  }

  return new AppError(500, 'internal_error', 'An unexpected error occurred.');
}

export function errorTypeOf(error: AppError): ErrorType {
  return ERROR_TYPES[error.code] ?? 'InternalError';
}

// This helper classifies one tool failure for audit records and protocol error mapping.
export function toolFailureKindOf(error: AppError): ToolFailureKind {
  return TOOL_FAILURE_KINDS[error.code] ?? 'unexpected';
}

// This helper exposes error codes in the upper-case form used by agent error envelopes.
export function publicErrorCode(error: AppError): string {
  return error.code.toUpperCase();
}
