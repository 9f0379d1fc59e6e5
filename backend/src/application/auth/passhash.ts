/**
 * Password hashing
 * passhash = sha512(password + ":" + sha512(accountName)), hex encoded
 */

import crypto from 'crypto';

const ACCOUNT_NAME_PATTERN = /^[0-9a-zA-Z_]{3,}$/;
const PASSWORD_PATTERN = /^[0-9a-zA-Z_]{6,}$/;

export function digest(src: string): string {
  return crypto.createHash('sha512').update(src).digest('hex');
}

export function calculateSalt(accountName: string): string {
  return digest(accountName);
}

export function calculatePasshash(accountName: string, password: string): string {
  return digest(`${password}:${calculateSalt(accountName)}`);
}

export function validateCredentials(accountName: string, password: string): boolean {
  return ACCOUNT_NAME_PATTERN.test(accountName) && PASSWORD_PATTERN.test(password);
}

/**
 * 16 random bytes, hex encoded
 */
export function secureRandomString(bytes: number = 16): string {
  return crypto.randomBytes(bytes).toString('hex');
}
