const SERVICE_PREFIX = '[SERVICE] ';

const describeFailure = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
};

/**
 * Raised when a call to the Strava API could not be completed by the transport.
 * HTTP error statuses are not reported this way; they surface on the response.
 */
export class ServiceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`${SERVICE_PREFIX}${message}`, options);
    this.name = 'ServiceError';
  }

  static fromUnknown(error: unknown): ServiceError {
    if (error instanceof ServiceError) {
      return error;
    }

    return new ServiceError(describeFailure(error), { cause: error });
  }
}

export class StravaOAuthError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = 'StravaOAuthError';
  }
}
