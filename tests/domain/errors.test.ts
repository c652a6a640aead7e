import {
  dependencyViolationError,
  ErrorCategory,
  httpStatusFor,
  internalError,
  invalidParameterValueError,
  isServiceException,
  missingParameterError,
  notFoundError,
  ServiceException,
  unsupportedActionError,
} from '../../src/domain/errors';

describe('Service error model', () => {
  test('notFoundError carries the type and provider code', () => {
    const error = notFoundError('vpc', 'InvalidVpcID.NotFound', 'vpc-123');
    expect(error.code).toBe('InvalidVpcID.NotFound');
    expect(error.category).toBe(ErrorCategory.NotFound);
    expect(error.resourceType).toBe('vpc');
    expect(error.message).toBe("The vpc ID 'vpc-123' does not exist");
  });

  test('dependencyViolationError lists the dependents', () => {
    const error = dependencyViolationError('vpc', 'vpc-1', ['subnet-1']);
    expect(error.code).toBe('DependencyViolation');
    expect(error.details).toEqual({ resourceId: 'vpc-1', dependents: ['subnet-1'] });
  });

  test('parameter errors use the provider codes', () => {
    expect(missingParameterError('CidrBlock').message).toBe('The request must contain the parameter CidrBlock');
    expect(invalidParameterValueError('Size', 'x').message).toBe('Value (x) for parameter Size is invalid');
  });

  test('unsupported actions render as InvalidAction', () => {
    const error = unsupportedActionError('ec2', 'LaunchRocket');
    expect(error.code).toBe('InvalidAction');
    expect(error.category).toBe(ErrorCategory.UnsupportedAction);
  });

  test('only internal errors map to 500', () => {
    expect(httpStatusFor(internalError('boom'))).toBe(500);
    expect(httpStatusFor(missingParameterError('X'))).toBe(400);
    expect(httpStatusFor(notFoundError('subnet', 'InvalidSubnetID.NotFound', 'subnet-1'))).toBe(400);
  });

  test('ServiceException carries the error record', () => {
    const err = new ServiceException(internalError('boom'));
    expect(isServiceException(err)).toBe(true);
    expect(isServiceException(new Error('boom'))).toBe(false);
    expect(err.message).toBe('boom');
    expect(err.serviceError.code).toBe('InternalError');
  });
});
