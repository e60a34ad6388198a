import { config } from '../config';
import {
  CarrierSummary,
  CarrierValidationResult,
  FMCSACarrierRaw,
  RegistryFailureReason,
  RegistryOutcome,
} from '../types';
import logger, { logRegistry } from '../utils/logger';

// The slice of fetch() the validator relies on; the global fetch satisfies it
export interface RegistryResponse {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}

export interface RegistryRequestInit {
  method: 'GET';
  headers: Record<string, string>;
  signal: AbortSignal;
}

export type FetchFn = (input: string, init: RegistryRequestInit) => Promise<RegistryResponse>;

export interface CarrierValidatorOptions {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: FetchFn;
}

// Transport/parse failure of the registry call. Caught inside the validator, never sent upstream.
export class ValidatorTransportError extends Error {
  reason: RegistryFailureReason;

  constructor(reason: RegistryFailureReason, message: string) {
    super(message);
    this.name = 'ValidatorTransportError';
    this.reason = reason;
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const optionalString = (value: unknown): string | null => {
  if (typeof value === 'string' && value.trim() !== '') return value;
  if (typeof value === 'number') return String(value);
  return null;
};

// Strip an "MC" prefix and separators: "mc-012345" -> "012345"
export const normalizeMcNumber = (raw: string): string =>
  raw.trim().toUpperCase().replace(/^MC[\s#-]*/, '').trim();

const failureDetail = (reason: RegistryFailureReason, message: string): string => {
  switch (reason) {
    case 'timeout':
    case 'network':
      return `registry unreachable: ${message}`;
    case 'http_status':
      return `registry error: ${message}`;
    case 'malformed':
      return `registry returned a malformed response: ${message}`;
    case 'not_configured':
      return `registry not configured: ${message}`;
  }
};

const toCarrierSummary = (carrier: FMCSACarrierRaw): CarrierSummary => ({
  legal_name: optionalString(carrier.legalName),
  dba_name: optionalString(carrier.dbaName),
  dot_number: optionalString(carrier.dotNumber),
  safety_rating: optionalString(carrier.safetyRating),
  safety_rating_date: optionalString(carrier.safetyRatingDate),
  status_code: optionalString(carrier.statusCode),
  state: optionalString(carrier.phyState),
});

/**
 * Reduce a registry outcome to the response body. Every outcome, including a
 * failed call, is a normal result; the caller tells them apart by `detail`.
 */
export const toValidationResult = (mcNumber: string, outcome: RegistryOutcome): CarrierValidationResult => {
  switch (outcome.kind) {
    case 'authorized':
      return {
        mc_number: mcNumber,
        is_valid: true,
        detail: 'Carrier is authorized to operate',
        carrier: toCarrierSummary(outcome.carrier),
      };
    case 'unauthorized':
      return {
        mc_number: mcNumber,
        is_valid: false,
        detail: 'Carrier is not authorized to operate',
        carrier: toCarrierSummary(outcome.carrier),
      };
    case 'not_found':
      return { mc_number: mcNumber, is_valid: false, detail: 'not found' };
    case 'failed':
      return { mc_number: mcNumber, is_valid: false, detail: failureDetail(outcome.reason, outcome.message) };
  }
};

const toRawCarrier = (record: Record<string, unknown>): FMCSACarrierRaw => ({
  dotNumber: optionalString(record.dotNumber),
  legalName: optionalString(record.legalName),
  dbaName: optionalString(record.dbaName),
  allowedToOperate: optionalString(record.allowedToOperate),
  safetyRating: optionalString(record.safetyRating),
  safetyRatingDate: optionalString(record.safetyRatingDate),
  statusCode: optionalString(record.statusCode),
  phyState: optionalString(record.phyState),
});

// Pull the first carrier out of a docket-number (array) or DOT (object) response
const extractCarrier = (body: unknown): FMCSACarrierRaw | null => {
  if (!isRecord(body) || !('content' in body)) {
    throw new ValidatorTransportError('malformed', 'missing "content"');
  }

  const { content } = body;
  let entry: unknown;

  if (Array.isArray(content)) {
    if (content.length === 0) return null;
    entry = content[0];
  } else if (content === null) {
    return null;
  } else {
    entry = content;
  }

  if (!isRecord(entry) || !isRecord(entry.carrier)) {
    throw new ValidatorTransportError('malformed', 'missing "carrier" record');
  }

  return toRawCarrier(entry.carrier);
};

export class CarrierValidator {
  private apiKey: string;
  private baseUrl: string;
  private timeoutMs: number;
  private fetchFn: FetchFn;

  constructor(options: CarrierValidatorOptions = {}) {
    this.apiKey = options.apiKey ?? config.fmcsa.apiKey;
    this.baseUrl = (options.baseUrl ?? config.fmcsa.baseUrl).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? config.fmcsa.timeoutMs;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  get isConfigured(): boolean {
    return this.apiKey !== '';
  }

  // Check one MC number; resolves for every registry outcome
  async validate(mcNumber: string): Promise<CarrierValidationResult> {
    const docketNumber = normalizeMcNumber(mcNumber);
    if (!docketNumber) {
      // Nothing the registry could match
      return toValidationResult(mcNumber, { kind: 'not_found' });
    }

    const outcome = await this.lookup(docketNumber);
    return toValidationResult(mcNumber, outcome);
  }

  // Single registry call, no retry. Failures come back as `{ kind: 'failed' }`.
  async lookup(docketNumber: string): Promise<RegistryOutcome> {
    if (!this.isConfigured) {
      return { kind: 'failed', reason: 'not_configured', message: 'FMCSA_API_KEY is not set' };
    }

    const startTime = Date.now();
    try {
      const carrier = await this.fetchCarrier(docketNumber);
      const outcome: RegistryOutcome = !carrier
        ? { kind: 'not_found' }
        : String(carrier.allowedToOperate ?? '').toUpperCase() === 'Y'
          ? { kind: 'authorized', carrier }
          : { kind: 'unauthorized', carrier };

      logRegistry('MC lookup', Date.now() - startTime, { docketNumber, outcome: outcome.kind });
      return outcome;
    } catch (error) {
      if (error instanceof ValidatorTransportError) {
        logger.warn('FMCSA lookup failed', {
          docketNumber,
          reason: error.reason,
          error: error.message,
          duration: `${Date.now() - startTime}ms`,
        });
        return { kind: 'failed', reason: error.reason, message: error.message };
      }
      throw error;
    }
  }

  // URL without the key, for logs
  private lookupUrl(docketNumber: string): string {
    return `${this.baseUrl}/carriers/docket-number/${encodeURIComponent(docketNumber)}`;
  }

  private async fetchCarrier(docketNumber: string): Promise<FMCSACarrierRaw | null> {
    const url = `${this.lookupUrl(docketNumber)}?webKey=${encodeURIComponent(this.apiKey)}`;
    logger.debug('FMCSA MC lookup', { url: `${this.lookupUrl(docketNumber)}?webKey=[REDACTED]` });

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      let response: RegistryResponse;
      try {
        response = await this.fetchFn(url, {
          method: 'GET',
          headers: { Accept: 'application/json' },
          signal: controller.signal,
        });
      } catch (error) {
        if (controller.signal.aborted) {
          throw new ValidatorTransportError('timeout', `timed out after ${this.timeoutMs}ms`);
        }
        const message = error instanceof Error ? error.message : String(error);
        throw new ValidatorTransportError('network', message);
      }

      if (response.status === 404) {
        return null;
      }

      if (!response.ok) {
        throw new ValidatorTransportError('http_status', `unexpected HTTP status ${response.status}`);
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch {
        if (controller.signal.aborted) {
          throw new ValidatorTransportError('timeout', `timed out after ${this.timeoutMs}ms`);
        }
        throw new ValidatorTransportError('malformed', 'body is not valid JSON');
      }

      return extractCarrier(body);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

export const carrierValidator = new CarrierValidator();
export default carrierValidator;
