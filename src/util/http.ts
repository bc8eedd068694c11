type RequestError = Error & { status?: number; detail?: string };

export const getStatus = (error: unknown): number | undefined => {
  if (error && typeof error === 'object' && 'status' in error) {
    const { status } = error;
    if (typeof status === 'number') {
      return status;
    }
  }
  return undefined;
};

export const getDetail = (error: unknown): string | undefined => {
  if (error instanceof Error && error.message) {
    return error.message;
  }

  if (error && typeof error === 'object' && 'detail' in error) {
    const { detail } = error;
    if (typeof detail === 'string') {
      return detail;
    }
  }

  return undefined;
};

export const createRequestError = (status: number, detail: string): RequestError => {
  const error: RequestError = new Error(detail);
  error.status = status;
  error.detail = detail;
  return error;
};

/**
 * Client errors are final, except request timeouts and rate limiting.
 * Network failures and 5xx responses are retried.
 */
export const shouldRetryRequest = (error: unknown): boolean => {
  const status = getStatus(error);

  if (typeof status === 'number' && status >= 400 && status < 500) {
    return status === 408 || status === 429;
  }

  return true;
};

export const describeFailure = (error: unknown): string => {
  const status = getStatus(error);
  const detail = getDetail(error) ?? 'Unknown error';

  return typeof status === 'number' ? `status ${status}: ${detail}` : detail;
};

export type { RequestError };
