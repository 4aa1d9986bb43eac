/**
 * Hashing Utilities
 *
 * 1. PASSWORD HASHING (bcrypt)
 *    - Salted, one-way, deliberately slow
 *    - Used ONLY for account passwords
 *
 * 2. GENERAL HASHING (SHA-256)
 *    - Deterministic
 *    - Used to keep identifiers out of the logs
 */

import bcrypt from 'bcryptjs';
import crypto from 'crypto';

const DEFAULT_SALT_ROUNDS = 12;

function saltRounds(): number {
  const configured = parseInt(process.env.BCRYPT_ROUNDS || '', 10);
  return Number.isInteger(configured) && configured >= 4 ? configured : DEFAULT_SALT_ROUNDS;
}

/**
 * Hash a password using bcrypt
 * @returns Hashed password (safe to store in database)
 */
export async function hashPassword(password: string): Promise<string> {
  return bcrypt.hash(password, saltRounds());
}

/**
 * Verify a password against a stored hash
 */
export async function verifyPassword(password: string, hash: string): Promise<boolean> {
  return bcrypt.compare(password, hash);
}

/**
 * Create a SHA-256 hash (for logs, non-password data)
 * @returns Hex-encoded SHA-256 hash
 */
export function sha256Hash(data: string): string {
  return crypto.createHash('sha256').update(data).digest('hex');
}
