import { describe, it, expect } from 'vitest';
import type { Request } from 'express';
import { transformErrorToResponse } from '../errorTransformation.js';
import { AppError, ErrorCode, InsufficientInputError } from '../../types/errors.js';

function fakeRequest(originalUrl: string): Pick<Request, 'originalUrl'> {
  return { originalUrl };
}

describe('transformErrorToResponse', () => {
  it('keeps the message and context of operational errors', () => {
    const response = transformErrorToResponse(new InsufficientInputError(12, 50), fakeRequest('/api/analysis/text?x=1'));

    expect(response).toMatchObject({
      error: 'Unprocessable Entity',
      code: ErrorCode.INSUFFICIENT_INPUT,
      message: 'Please provide text of at least 50 characters (received 12)',
      statusCode: 422,
      path: '/api/analysis/text',
      context: { actualLength: 12, minLength: 50 },
    });
    expect(response).not.toHaveProperty('stack');
  });

  it('hides the message of unexpected errors', () => {
    const response = transformErrorToResponse(new Error('ENOENT: /srv/secret/path'), fakeRequest('/api/analysis/text'));

    expect(response).toMatchObject({
      error: 'Internal Server Error',
      code: ErrorCode.INTERNAL_SERVER_ERROR,
      message: 'An unexpected error occurred',
      statusCode: 500,
    });
  });

  it('exposes details and stack when requested', () => {
    const error = new AppError('policy missing', ErrorCode.CONFIGURATION_ERROR, 500, false, { path: 'x.json' });

    const response = transformErrorToResponse(error, fakeRequest('/health'), true);

    expect(response.message).toBe('policy missing');
    expect(response.context).toEqual({ path: 'x.json' });
    expect(response.stack).toContain('policy missing');
  });
});
