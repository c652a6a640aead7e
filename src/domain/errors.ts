/**
 * Typed error model.
 *
 * Every failure a handler, the store or the decoder can produce is a
 * ServiceError: a stable provider error code (e.g. "InvalidVpcID.NotFound"),
 * a human-readable message, and a category the gateway uses to pick the
 * HTTP status and log level. Errors travel as thrown ServiceExceptions and
 * are rendered into the wire envelope at the gateway boundary.
 */

import type { ResourceTypeTag } from './resource-types';

/** Error taxonomy. */
export enum ErrorCategory {
  /** Request decoding failed. Client-attributable. */
  MalformedParameter = 'MalformedParameter',
  /** A resource-specific precondition failed. */
  ValidationFailed = 'ValidationFailed',
  /** A referenced resource does not exist. */
  NotFound = 'NotFound',
  /** Delete blocked by a live reference. */
  DependencyViolation = 'DependencyViolation',
  /** No handler registered for the action. */
  UnsupportedAction = 'UnsupportedAction',
  /** ID allocation exhaustion or a broken invariant. */
  Internal = 'Internal',
}

export interface ServiceError {
  /** Provider error code, rendered verbatim on the wire. */
  code: string;
  message: string;
  category: ErrorCategory;
  /** Resource type for NotFound and DependencyViolation errors. */
  resourceType?: ResourceTypeTag;
  details?: Record<string, unknown>;
}

/** Create a service error with defaults. */
export function createServiceError(params: {
  code: string;
  message: string;
  category: ErrorCategory;
  resourceType?: ResourceTypeTag;
  details?: Record<string, unknown>;
}): ServiceError {
  return {
    code: params.code,
    message: params.message,
    category: params.category,
    resourceType: params.resourceType,
    details: params.details,
  };
}

/** Thrown wrapper carrying a ServiceError to the gateway boundary. */
export class ServiceException extends Error {
  constructor(public readonly serviceError: ServiceError) {
    super(serviceError.message);
    this.name = 'ServiceException';
  }
}

export function isServiceException(err: unknown): err is ServiceException {
  return err instanceof ServiceException;
}

// --- Factory functions ---

export function malformedParameterError(message: string, code = 'InvalidParameter'): ServiceError {
  return createServiceError({ code, message, category: ErrorCategory.MalformedParameter });
}

export function validationError(code: string, message: string, details?: Record<string, unknown>): ServiceError {
  return createServiceError({ code, message, category: ErrorCategory.ValidationFailed, details });
}

export function missingParameterError(name: string): ServiceError {
  return validationError(
    'MissingParameter',
    `The request must contain the parameter ${name}`,
    { parameter: name },
  );
}

export function invalidParameterValueError(name: string, value: string, reason?: string): ServiceError {
  const suffix = reason ? `: ${reason}` : '';
  return validationError(
    'InvalidParameterValue',
    `Value (${value}) for parameter ${name} is invalid${suffix}`,
    { parameter: name, value },
  );
}

export function notFoundError(
  resourceType: ResourceTypeTag,
  code: string,
  resourceId: string,
): ServiceError {
  return createServiceError({
    code,
    message: `The ${resourceType} ID '${resourceId}' does not exist`,
    category: ErrorCategory.NotFound,
    resourceType,
    details: { resourceId },
  });
}

export function dependencyViolationError(
  resourceType: ResourceTypeTag,
  resourceId: string,
  dependents: string[],
): ServiceError {
  return createServiceError({
    code: 'DependencyViolation',
    message: `The ${resourceType} '${resourceId}' has dependencies and cannot be deleted.`,
    category: ErrorCategory.DependencyViolation,
    resourceType,
    details: { resourceId, dependents },
  });
}

export function unsupportedActionError(service: string, action: string): ServiceError {
  return createServiceError({
    code: 'InvalidAction',
    message: `The action ${action} is not valid for this web service (${service}).`,
    category: ErrorCategory.UnsupportedAction,
    details: { service, action },
  });
}

export function internalError(message: string, details?: Record<string, unknown>): ServiceError {
  return createServiceError({
    code: 'InternalError',
    message,
    category: ErrorCategory.Internal,
    details,
  });
}

/** HTTP status for an error category. */
export function httpStatusFor(error: ServiceError): number {
  return error.category === ErrorCategory.Internal ? 500 : 400;
}

