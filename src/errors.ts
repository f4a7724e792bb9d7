/**
 * Inventory Error Classes
 *
 * Typed error hierarchy for credential delegation and resource collection.
 */

/** Base error context for all inventory errors */
export interface BaseErrorContext {
  message?: string;
  code?: string;
  statusCode?: number;
  requestId?: string;
  awsMessage?: string;
  original?: unknown;
  description?: string;
  suggestion?: string;
  retriable?: boolean;
  [key: string]: unknown;
}

/** Serialized error format */
export interface SerializedError {
  name: string;
  message: string;
  code?: string;
  statusCode?: number;
  requestId?: string;
  awsMessage?: string;
  thrownAt?: Date;
  retriable?: boolean;
  suggestion?: string;
  description?: string;
  data?: Record<string, unknown>;
  original?: unknown;
  stack?: string;
}

export class BaseError extends Error {
  thrownAt: Date;
  code?: string;
  statusCode: number;
  requestId?: string;
  awsMessage?: string;
  original?: unknown;
  description?: string;
  suggestion?: string;
  retriable: boolean;
  data: Record<string, unknown>;

  constructor(context: BaseErrorContext) {
    const {
      message = 'Unknown error',
      code,
      statusCode,
      requestId,
      awsMessage,
      original,
      description,
      suggestion,
      retriable,
      ...rest
    } = context;

    super(message);

    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor);
    }

    this.name = this.constructor.name;
    this.thrownAt = new Date();
    this.code = code;
    this.statusCode = statusCode ?? 500;
    this.requestId = requestId;
    this.awsMessage = awsMessage;
    this.original = original;
    this.description = description;
    this.suggestion = suggestion;
    this.retriable = retriable ?? false;
    this.data = {
      ...rest,
      message,
      suggestion: this.suggestion,
      retriable: this.retriable,
    };
  }

  toJSON(): SerializedError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      requestId: this.requestId,
      awsMessage: this.awsMessage,
      thrownAt: this.thrownAt,
      retriable: this.retriable,
      suggestion: this.suggestion,
      description: this.description,
      data: this.data,
      original: this.original instanceof Error
        ? { name: this.original.name, message: this.original.message }
        : this.original,
      stack: this.stack,
    };
  }

  override toString(): string {
    return `${this.name} | ${this.message}`;
  }
}

/** AWS SDK v3 service exception shape */
export interface AwsErrorLike {
  name?: string;
  code?: string;
  Code?: string;
  message?: string;
  statusCode?: number;
  $metadata?: {
    httpStatusCode?: number;
    requestId?: string;
  };
}

function isAwsErrorLike(value: unknown): value is AwsErrorLike {
  return typeof value === 'object' && value !== null;
}

export interface InventoryErrorDetails {
  original?: unknown;
  statusCode?: number;
  retriable?: boolean;
  suggestion?: string;
  description?: string;
  [key: string]: unknown;
}

export class InventoryError extends BaseError {
  constructor(message: string, details: InventoryErrorDetails = {}) {
    let code: string | undefined;
    let statusCode: number | undefined;
    let requestId: string | undefined;
    let awsMessage: string | undefined;

    if (isAwsErrorLike(details.original)) {
      const awsError = details.original;
      code = awsError.code || awsError.Code || awsError.name;
      statusCode = awsError.statusCode || awsError.$metadata?.httpStatusCode;
      requestId = awsError.$metadata?.requestId;
      awsMessage = awsError.message;
    }

    super({
      message,
      ...details,
      code,
      statusCode: details.statusCode ?? statusCode,
      requestId,
      awsMessage,
    });
  }
}

export class ConfigurationError extends InventoryError {
  violations: string[];

  constructor(message: string, details: InventoryErrorDetails & { violations?: string[] } = {}) {
    const { violations = [], ...rest } = details;
    super(message, {
      statusCode: 400,
      retriable: false,
      suggestion: 'Provide at least one account target, one region and one enabled service.',
      ...rest,
    });
    this.violations = violations;
  }
}

export interface DelegationErrorDetails extends InventoryErrorDetails {
  roleArn?: string;
  sessionName?: string;
}

export class DelegationError extends InventoryError {
  roleArn?: string;

  constructor(message: string, details: DelegationErrorDetails = {}) {
    super(message, {
      retriable: false,
      suggestion: 'Check the role ARN, its trust policy and the STS endpoint of the region.',
      ...details,
    });
    this.roleArn = details.roleArn;
  }
}

export class AuthorizationError extends DelegationError {
  constructor(message: string, details: DelegationErrorDetails = {}) {
    super(message, {
      statusCode: 403,
      suggestion: 'The caller is not allowed to assume this role. Verify the trust policy and external id.',
      ...details,
    });
  }
}

export interface CollectionErrorDetails extends InventoryErrorDetails {
  service: string;
  accountId: string;
  region: string;
}

export class CollectionError extends InventoryError {
  service: string;
  accountId: string;
  region: string;

  constructor(message: string, details: CollectionErrorDetails) {
    super(message, {
      retriable: false,
      suggestion: 'Verify the delegated role grants read access to this service in this region.',
      ...details,
    });
    this.service = details.service;
    this.accountId = details.accountId;
    this.region = details.region;
  }
}

export interface SecondaryLookupErrorDetails extends InventoryErrorDetails {
  service: string;
  resource: string;
}

export class SecondaryLookupError extends InventoryError {
  service: string;
  resource: string;

  constructor(message: string, details: SecondaryLookupErrorDetails) {
    super(message, { retriable: true, ...details });
    this.service = details.service;
    this.resource = details.resource;
  }
}

export interface MapDelegationErrorContext {
  roleArn?: string;
  sessionName?: string;
}

const ACCESS_DENIED_CODES = new Set(['AccessDenied', 'AccessDeniedException']);

export function mapDelegationError(err: unknown, context: MapDelegationErrorContext = {}): DelegationError {
  if (err instanceof DelegationError) return err;

  const awsErr: AwsErrorLike = isAwsErrorLike(err) ? err : {};
  const code = awsErr.code || awsErr.Code || awsErr.name;
  const status = awsErr.statusCode || awsErr.$metadata?.httpStatusCode;
  const reason = err instanceof Error ? err.message : String(err);

  if ((code && ACCESS_DENIED_CODES.has(code)) || status === 403) {
    return new AuthorizationError(`Not authorized to assume role: ${context.roleArn ?? 'unknown'}`, {
      ...context,
      original: err,
      description: reason,
    });
  }

  return new DelegationError(`Failed to assume role ${context.roleArn ?? 'unknown'}: ${reason}`, {
    ...context,
    original: err,
    description: reason,
  });
}
