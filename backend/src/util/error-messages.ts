import type { ErrorResponse } from './error-messages.types.js';

export const ERROR_MESSAGES = {
  notFound: 'not found',
  invalidQuery: 'invalid query string',
  internal: 'internal server error',
};

export function errorResponse(message: string): ErrorResponse {
  return { error: message };
}
