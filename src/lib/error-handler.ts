import axios, { AxiosError } from 'axios';
import { z } from 'zod';
import {
  RequestTimeoutError,
  ResourceAccessForbiddenError,
  ResourceAuthenticationError,
  ResourceBadRequestError,
  ResourceNotFoundError,
  SapiError,
  SapiRequestError,
} from './errors';

const SapiErrorBodySchema = z.object({
  error_code: z.number().int(),
  error_msg: z.string(),
});

const TIMEOUT_CODES = new Set<string | undefined>([AxiosError.ECONNABORTED, AxiosError.ETIMEDOUT]);

export function toSapiError(error: unknown): Error {
  if (error instanceof SapiError) return error;
  if (!axios.isAxiosError(error)) {
    return error instanceof Error ? error : new SapiRequestError(String(error), { cause: error });
  }

  if (TIMEOUT_CODES.has(error.code)) {
    return new RequestTimeoutError(error.message, { cause: error });
  }

  const response = error.response;
  if (!response) {
    return new SapiRequestError(error.message, { cause: error });
  }

  const body = SapiErrorBodySchema.safeParse(response.data);
  const status = response.status;
  const options = {
    status,
    errorCode: body.success ? body.data.error_code : undefined,
    extras: { url: error.config?.url, method: error.config?.method },
    cause: error,
  };
  const message = body.success ? body.data.error_msg : error.message;

  switch (status) {
    case 400:
      return new ResourceBadRequestError(message, options);
    case 401:
      return new ResourceAuthenticationError(message, options);
    case 403:
      return new ResourceAccessForbiddenError(message, options);
    case 404:
      return new ResourceNotFoundError(message, options);
    default:
      return new SapiRequestError(message, options);
  }
}
