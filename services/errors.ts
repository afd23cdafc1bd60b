export type FaultCode = 'InvalidParameterValue' | 'MissingParameter' | 'NumberDomainsExceeded';

/**
 * A fault the emulated service reports to its callers. The code set is closed;
 * the boundary adapter renders these as error documents.
 */
export class SimpleDbFault extends Error {
  readonly code: FaultCode;

  constructor(code: FaultCode, message: string) {
    super(message);
    this.name = 'SimpleDbFault';
    this.code = code;
  }
}

export const faults = {
  invalidParameterValue: (parameter: string, value: string) =>
    new SimpleDbFault('InvalidParameterValue', `Value (${value}) for parameter ${parameter} is invalid.`),

  noSuchDomain: (domainName: string) =>
    new SimpleDbFault('InvalidParameterValue', `The specified domain ${domainName} does not exist.`),

  missingParameter: (parameter: string) =>
    new SimpleDbFault('MissingParameter', `The request must contain the parameter ${parameter}`),

  numberDomainsExceeded: () =>
    new SimpleDbFault('NumberDomainsExceeded', 'Number of domains limit exceeded.'),
};

export type InternalErrorCode = 'InternalError' | 'InvalidQueryExpression';

/** Backing-store failures and select expressions outside the supported dialect. */
export class InternalError extends Error {
  readonly code: InternalErrorCode;

  constructor(code: InternalErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InternalError';
    this.code = code;
  }
}

export const invalidQuery = (message: string, cause?: unknown) =>
  new InternalError('InvalidQueryExpression', message, cause === undefined ? undefined : { cause });

/** Wraps anything that is not already one of ours so the boundary sees a typed error. */
export const toInternalError = (error: unknown, context: string): SimpleDbFault | InternalError => {
  if (error instanceof SimpleDbFault || error instanceof InternalError) return error;
  const detail = error instanceof Error ? error.message : String(error);
  return new InternalError('InternalError', `${context}: ${detail}`, { cause: error });
};
