/**
 * Authentication Service
 *
 * Accounts log in with username + password and receive a signed JWT:
 *
 *   HEADER.PAYLOAD.SIGNATURE
 *
 * The payload carries the account id, username and role. Protected routes
 * verify the signature (see auth.middleware.ts) before doing anything else.
 * Tokens do not expire unless JWT_EXPIRES_IN is set.
 */

import jwt from 'jsonwebtoken';
import { Queryable } from '../models/db';
import { createUser, findUserByEmail, findUserById, findUserByUsername, updateUserPassword } from '../models/user.model';
import { AuthResponse, TokenClaims, User, UserPublic, UserRole } from '../types';
import { AuthError, ConflictError, NotFoundError, ValidationError } from '../utils/errors.utils';
import { hashPassword, verifyPassword } from '../utils/hash.utils';
import { createRequestContext, logInfo } from '../utils/logger.utils';
import {
  assertValid,
  collectErrors,
  isUserRole,
  orNull,
  readSecret,
  readText,
  validatePassword,
  validateRegistration,
} from '../utils/validation.utils';

const DEFAULT_ROLE: UserRole = 'receptionist';

function jwtSecret(): string {
  return process.env.JWT_SECRET || 'fallback-secret-not-for-production';
}

function jwtExpiresIn(): string | undefined {
  const configured = process.env.JWT_EXPIRES_IN?.trim();
  return configured ? configured : undefined;
}

/**
 * Convert a database row to UserPublic (drops password_hash)
 */
export function toUserPublic(user: User): UserPublic {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    tipo_usuario: user.tipo_usuario,
    ativo: user.ativo,
    data_cadastro: user.data_cadastro,
  };
}

/**
 * Create a new account
 */
export async function register(tx: Queryable, body: Record<string, unknown>): Promise<UserPublic> {
  const username = readText(body, 'username');
  const password = readSecret(body, 'password');
  const email = readText(body, 'email');
  const role = readText(body, 'tipo_usuario') || DEFAULT_ROLE;

  assertValid(validateRegistration({ username, password, email, tipo_usuario: role }));
  const tipoUsuario = isUserRole(role) ? role : DEFAULT_ROLE;

  if (await findUserByUsername(tx, username)) {
    throw new ConflictError('Username already exists', 'USERNAME_EXISTS');
  }
  if (email && (await findUserByEmail(tx, email))) {
    throw new ConflictError('Email already in use', 'EMAIL_EXISTS');
  }

  const user = await createUser(tx, {
    username,
    password_hash: await hashPassword(password),
    email: orNull(email),
    tipo_usuario: tipoUsuario,
  });

  logInfo('auth.register', 'Account created', createRequestContext(undefined, user.id, 'user', user.id), {
    role: user.tipo_usuario,
  });

  return toUserPublic(user);
}

/**
 * Sign a token for an account
 */
export function issueToken(claims: TokenClaims): { token: string; expiresAt: Date | null } {
  const expiresIn = jwtExpiresIn();
  const token = expiresIn
    ? jwt.sign(claims, jwtSecret(), { expiresIn: expiresIn as jwt.SignOptions['expiresIn'] })
    : jwt.sign(claims, jwtSecret());

  const decoded = jwt.decode(token);
  const exp = decoded !== null && typeof decoded === 'object' ? decoded.exp : undefined;
  return { token, expiresAt: exp !== undefined ? new Date(exp * 1000) : null };
}

/**
 * Log in with username + password.
 * Inactive accounts can still log in; only the password is checked.
 */
export async function login(tx: Queryable, body: Record<string, unknown>): Promise<AuthResponse> {
  const username = readText(body, 'username');
  const password = readSecret(body, 'password');

  if (!username || !password) {
    throw new ValidationError('Username and password are required');
  }

  const user = await findUserByUsername(tx, username);
  if (!user || !(await verifyPassword(password, user.password_hash))) {
    throw new AuthError('Invalid username or password', 'INVALID_CREDENTIALS');
  }

  const { token, expiresAt } = issueToken({
    userId: user.id,
    username: user.username,
    role: user.tipo_usuario,
  });

  logInfo('auth.login', 'Account logged in', createRequestContext(undefined, user.id, 'user', user.id));

  return { user: toUserPublic(user), token, expiresAt };
}

/**
 * Verify a JWT and check its claims
 * @returns The claims if valid, null if invalid or expired
 */
export function verifyToken(token: string): TokenClaims | null {
  let payload: string | jwt.JwtPayload;
  try {
    payload = jwt.verify(token, jwtSecret());
  } catch {
    return null;
  }

  if (typeof payload === 'string') {
    return null;
  }
  const userId: unknown = payload.userId;
  const username: unknown = payload.username;
  const role: unknown = payload.role;
  if (typeof userId !== 'number' || !Number.isInteger(userId)) {
    return null;
  }
  if (typeof username !== 'string' || typeof role !== 'string' || !isUserRole(role)) {
    return null;
  }
  return { userId, username, role };
}

export async function getProfile(tx: Queryable, claims: TokenClaims): Promise<UserPublic> {
  const user = await findUserById(tx, claims.userId);
  if (!user) {
    throw new NotFoundError('User not found', 'USER_NOT_FOUND');
  }
  return toUserPublic(user);
}

export async function changePassword(
  tx: Queryable,
  claims: TokenClaims,
  body: Record<string, unknown>
): Promise<void> {
  const user = await findUserById(tx, claims.userId);
  if (!user) {
    throw new NotFoundError('User not found', 'USER_NOT_FOUND');
  }

  const currentPassword = readSecret(body, 'current_password');
  const newPassword = readSecret(body, 'new_password');

  if (!currentPassword || !newPassword) {
    throw new ValidationError('Current and new password are required');
  }

  if (!(await verifyPassword(currentPassword, user.password_hash))) {
    throw new AuthError('Current password is incorrect', 'INVALID_CREDENTIALS');
  }

  assertValid(collectErrors(validatePassword(newPassword, 'new_password')));

  await updateUserPassword(tx, user.id, await hashPassword(newPassword));

  logInfo('auth.password_changed', 'Password changed', createRequestContext(undefined, user.id, 'user', user.id));
}
