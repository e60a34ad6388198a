/**
 * Shared test helpers: registry stand-ins and fixture paths
 */

import path from 'path';
import type { FetchFn, RegistryResponse } from '../services/carrierValidator';

export const FIXTURE_CSV = path.join(__dirname, 'fixtures', 'loads.csv');

/**
 * Fake registry response with a JSON body
 */
export const jsonResponse = (body: unknown, status: number = 200): RegistryResponse => ({
  ok: status >= 200 && status < 300,
  status,
  json: jest.fn().mockResolvedValue(body),
});

/**
 * Fake registry response whose body is not JSON
 */
export const textResponse = (status: number = 200): RegistryResponse => ({
  ok: status >= 200 && status < 300,
  status,
  json: jest.fn().mockRejectedValue(new SyntaxError('Unexpected token < in JSON at position 0')),
});

/**
 * QCMobile docket-number payload for a single carrier
 */
export const registryCarrier = (overrides: Record<string, unknown> = {}) => ({
  content: [
    {
      carrier: {
        dotNumber: 1234567,
        legalName: 'Test Freight LLC',
        dbaName: null,
        allowedToOperate: 'Y',
        safetyRating: 'S',
        safetyRatingDate: '2024-03-15',
        statusCode: 'A',
        phyState: 'TX',
        ...overrides,
      },
    },
  ],
});

/**
 * Fetch stand-in that never answers on its own and rejects once aborted,
 * like a registry that accepted the connection and went quiet
 */
export const hangingFetch: FetchFn = (_input, init) =>
  new Promise<RegistryResponse>((_resolve, reject) => {
    init.signal.addEventListener('abort', () => {
      const error = new Error('This operation was aborted');
      error.name = 'AbortError';
      reject(error);
    });
  });

