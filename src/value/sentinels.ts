import { isObject } from '../utils/type-guards';
import type { PlainValue } from './types';

/**
 * Signature pair identifying a secret-wrapped value on the wire. Consumers
 * detect secrecy by the presence of this pair only, never by the content.
 */
export const SECRET_SIGNATURE_KEY = '4dabf18193072939515e22adb298388d';
export const SECRET_SIGNATURE_VALUE = '1b47061264138c4ac30d75fd1eb44270';

/**
 * Plain string the host engine uses for a not-yet-known value.
 */
export const UNKNOWN_SENTINEL = '04da6b54-80e4-46f7-96ec-b56ff0331ba9';

export type SecretSentinel = {
  [SECRET_SIGNATURE_KEY]: typeof SECRET_SIGNATURE_VALUE;
  value: PlainValue;
};

export function isSecretSentinel(
  plain: unknown
): plain is { [SECRET_SIGNATURE_KEY]: string; value?: unknown } {
  return isObject(plain) && plain[SECRET_SIGNATURE_KEY] === SECRET_SIGNATURE_VALUE;
}

export function wrapSecret(value: PlainValue): SecretSentinel {
  return { [SECRET_SIGNATURE_KEY]: SECRET_SIGNATURE_VALUE, value };
}

export function isUnknownSentinel(plain: unknown): boolean {
  return plain === UNKNOWN_SENTINEL;
}
