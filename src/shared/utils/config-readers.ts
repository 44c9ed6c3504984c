import { ConfigService } from '@nestjs/config';

/**
 * Environment values arrive as strings; these helpers coerce them and
 * fall back to the default when the value is missing or unparsable.
 */

export function readNumber(
  configService: ConfigService,
  key: string,
  defaultValue: number,
): number {
  const raw = configService.get<string | number>(key);
  if (raw === undefined || raw === null || raw === '') {
    return defaultValue;
  }
  const parsed = typeof raw === 'number' ? raw : Number(raw);
  return Number.isFinite(parsed) ? parsed : defaultValue;
}

export function readBoolean(
  configService: ConfigService,
  key: string,
  defaultValue: boolean,
): boolean {
  const raw = configService.get<string | boolean>(key);
  if (typeof raw === 'boolean') {
    return raw;
  }
  if (raw === undefined || raw === null || raw === '') {
    return defaultValue;
  }
  const normalized = raw.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['false', '0', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return defaultValue;
}

export function readString(
  configService: ConfigService,
  key: string,
  defaultValue: string,
): string {
  const raw = configService.get<string>(key);
  return raw && raw.trim().length > 0 ? raw.trim() : defaultValue;
}

export function readChoice<T extends string>(
  configService: ConfigService,
  key: string,
  choices: readonly T[],
  defaultValue: T,
): T {
  const raw = configService.get<string>(key);
  if (!raw) {
    return defaultValue;
  }
  const normalized = raw.trim().toLowerCase();
  return choices.find((choice) => choice === normalized) ?? defaultValue;
}
