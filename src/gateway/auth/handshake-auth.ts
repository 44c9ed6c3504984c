import { createHmac, timingSafeEqual } from 'crypto';
import {
  type AuthError,
  ExpiredSignatureError,
  InvalidSignatureError,
  MissingCredentialsError,
} from '../errors/gateway-errors';

export interface HandshakeCredentials {
  ts: string | null;
  sig: string | null;
}

export type HandshakeVerdict =
  | { accepted: true; authenticated: boolean }
  | { accepted: false; error: AuthError };

/**
 * Lowercase hex HMAC-SHA256 of the timestamp string.
 */
export function signTimestamp(ts: string, secret: string): string {
  return createHmac('sha256', secret).update(ts).digest('hex');
}

function headerValue(value: string | string[] | undefined): string | null {
  const first = Array.isArray(value) ? value[0] : value;
  return first && first.length > 0 ? first : null;
}

function queryParams(url: string | undefined): URLSearchParams {
  try {
    return new URL(url ?? '/', 'http://gateway.local').searchParams;
  } catch {
    // Unparseable request target: no credentials in the query
    return new URLSearchParams();
  }
}

/**
 * Reads ts/sig from the upgrade URL, falling back to the X-Api-Ts and
 * X-Api-Sign headers.
 */
export function extractCredentials(
  url: string | undefined,
  headers: Readonly<Record<string, string | string[] | undefined>>,
): HandshakeCredentials {
  const params = queryParams(url);
  return {
    ts: params.get('ts') || headerValue(headers['x-api-ts']),
    sig: params.get('sig') || headerValue(headers['x-api-sign']),
  };
}

/**
 * Checks a handshake. With no secret configured every handshake is
 * accepted unauthenticated. `nowSeconds` is Unix time.
 */
export function verifyHandshake(
  credentials: HandshakeCredentials,
  secret: string | null,
  toleranceSeconds: number,
  nowSeconds: number,
): HandshakeVerdict {
  if (!secret) {
    return { accepted: true, authenticated: false };
  }

  const { ts, sig } = credentials;
  if (!ts || !sig) {
    return { accepted: false, error: new MissingCredentialsError() };
  }

  const timestamp = /^-?\d+$/.test(ts) ? Number(ts) : Number.NaN;
  if (!Number.isSafeInteger(timestamp) || Math.abs(nowSeconds - timestamp) > toleranceSeconds) {
    return {
      accepted: false,
      error: new ExpiredSignatureError(timestamp, toleranceSeconds),
    };
  }

  const expected = Buffer.from(signTimestamp(ts, secret), 'utf8');
  const provided = Buffer.from(sig.toLowerCase(), 'utf8');
  if (expected.length !== provided.length || !timingSafeEqual(expected, provided)) {
    return { accepted: false, error: new InvalidSignatureError() };
  }

  return { accepted: true, authenticated: true };
}
