import { DomainErrorCode, createDomainServiceError } from './errors.js';

const SdkDomainCodes = {
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  UNKNOWN_SERVICE: 'UNKNOWN_SERVICE',
  SERVICE_COLLISION: 'SERVICE_COLLISION',
  ROLE_NOT_FOUND: 'ROLE_NOT_FOUND',
} as const;

export const SdkErrorCode = { ...DomainErrorCode, ...SdkDomainCodes } as const;
export type SdkErrorCodeType = (typeof SdkErrorCode)[keyof typeof SdkErrorCode];

export const SdkError = createDomainServiceError<SdkErrorCodeType>('Sdk', SdkErrorCode);
export type SdkError = InstanceType<typeof SdkError>;

/**
 * Provider resolution or SDK configuration is unusable.
 */
export class ConfigurationError extends SdkError {
  constructor(message: string, details?: Record<string, unknown>, cause?: Error) {
    super(message, 500, SdkErrorCode.CONFIGURATION_ERROR, cause, details);
    this.name = 'ConfigurationError';
  }

  static providerNotFound(namespace: string, name: string) {
    return new ConfigurationError(`No provider registered as "${name}" in ${namespace}`, { namespace, name });
  }

  static ambiguousProvider(namespace: string, name: string, sources: string[]) {
    return new ConfigurationError(
      `Provider "${name}" is registered ${sources.length} times in ${namespace}: ${sources.join(', ')}`,
      { namespace, name, sources }
    );
  }
}

/**
 * Raised before any mutation when a selector names a service the store does not know.
 */
export class UnknownServiceError extends SdkError {
  readonly service: string;
  readonly validServices: readonly string[];

  constructor(service: string, validServices: readonly string[]) {
    super(
      `Service ${service} not in list of valid services: ${validServices.join(', ')}`,
      404,
      SdkErrorCode.UNKNOWN_SERVICE,
      undefined,
      { service, validServices: [...validServices] }
    );
    this.name = 'UnknownServiceError';
    this.service = service;
    this.validServices = validServices;
  }
}

export class ServiceCollisionError extends SdkError {
  readonly serviceType: string;
  readonly roles: readonly [string, string];

  constructor(serviceType: string, existingRole: string, incomingRole: string) {
    super(
      `Roles "${existingRole}" and "${incomingRole}" both provide service type "${serviceType}"`,
      409,
      SdkErrorCode.SERVICE_COLLISION,
      undefined,
      { serviceType, roles: [existingRole, incomingRole] }
    );
    this.name = 'ServiceCollisionError';
    this.serviceType = serviceType;
    this.roles = [existingRole, incomingRole];
  }
}

export class ValidationError extends SdkError {
  readonly field: string;

  constructor(field: string, message: string, details?: Record<string, unknown>) {
    super(`Validation failed for ${field}: ${message}`, 400, SdkErrorCode.VALIDATION_ERROR, undefined, {
      field,
      ...details,
    });
    this.name = 'ValidationError';
    this.field = field;
  }
}

export class RoleLookupError extends SdkError {
  readonly role: string;

  constructor(role: string, availableRoles: readonly string[]) {
    super(
      `No provider defines role "${role}"`,
      404,
      SdkErrorCode.ROLE_NOT_FOUND,
      undefined,
      { role, availableRoles: [...availableRoles] }
    );
    this.name = 'RoleLookupError';
    this.role = role;
  }
}
