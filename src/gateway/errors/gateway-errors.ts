import { ServiceError } from '../../common/errors/service.error';

export type AuthErrorCode =
  | 'AUTH_MISSING'
  | 'AUTH_EXPIRED'
  | 'AUTH_INVALID_SIGNATURE';

/**
 * Handshake refusals. Fatal to the connection attempt only.
 */
export abstract class AuthError extends ServiceError {
  declare readonly code: AuthErrorCode;

  protected constructor(message: string, code: AuthErrorCode) {
    super(message, code, false);
  }
}

export class MissingCredentialsError extends AuthError {
  constructor() {
    super('missing ts/sig', 'AUTH_MISSING');
  }
}

export class ExpiredSignatureError extends AuthError {
  constructor(
    public readonly timestamp: number,
    public readonly toleranceSeconds: number,
  ) {
    super('timestamp out of range', 'AUTH_EXPIRED');
  }
}

export class InvalidSignatureError extends AuthError {
  constructor() {
    super('bad signature', 'AUTH_INVALID_SIGNATURE');
  }
}

export type ProtocolErrorCode = 'PROTOCOL_OVERSIZED_MESSAGE' | 'PROTOCOL_MALFORMED';

/**
 * Violations of the message protocol. The client is notified, then the
 * connection is closed with `closeCode`.
 */
export abstract class ProtocolError extends ServiceError {
  declare readonly code: ProtocolErrorCode;

  protected constructor(
    message: string,
    code: ProtocolErrorCode,
    public readonly closeCode: number,
  ) {
    super(message, code, false);
  }
}

export class OversizedMessageError extends ProtocolError {
  constructor(
    public readonly size: number,
    public readonly maxBytes: number,
  ) {
    // 1009: message too big
    super(`Message of ${size} bytes exceeds the ${maxBytes} byte limit`, 'PROTOCOL_OVERSIZED_MESSAGE', 1009);
  }
}

export class MalformedMessageError extends ProtocolError {
  constructor(detail: string) {
    // 1003: unsupported data
    super(`Malformed message: ${detail}`, 'PROTOCOL_MALFORMED', 1003);
  }
}
