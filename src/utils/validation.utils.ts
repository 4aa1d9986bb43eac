/**
 * Input Validation Utilities
 *
 * NEVER trust user input! Request bodies arrive as `unknown` and are read
 * through the helpers below before any rule runs.
 */

import { USER_ROLES, UserRole } from '../types';
import { NotFoundError, ValidationError } from './errors.utils';

export interface FieldError {
  field: string;
  message: string;
}

export interface ValidationResult {
  isValid: boolean;
  errors: FieldError[];
}

const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

export const MIN_USERNAME_LENGTH = 3;
export const MIN_PASSWORD_LENGTH = 6;
export const MIN_PATIENT_NAME_LENGTH = 2;

// ======================
// BODY READERS
// ======================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Request bodies must be JSON objects
 */
export function requireBody(body: unknown): Record<string, unknown> {
  if (!isRecord(body)) {
    throw new ValidationError('Request body must be a JSON object', undefined, 'INVALID_BODY');
  }
  return body;
}

export function hasField(body: Record<string, unknown>, field: string): boolean {
  return Object.prototype.hasOwnProperty.call(body, field);
}

/**
 * Read a text field, trimmed. Absent and null read as ''.
 * Numbers are accepted and stringified (a cpf often arrives as a number).
 */
export function readText(body: Record<string, unknown>, field: string): string {
  const value = body[field];
  if (value === undefined || value === null) {
    return '';
  }
  if (typeof value === 'string') {
    return value.trim();
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  throw new ValidationError(`${field} must be a string`, [{ field, message: 'Expected a string' }]);
}

/**
 * Read a password field as sent; passwords are never trimmed
 */
export function readSecret(body: Record<string, unknown>, field: string): string {
  const value = body[field];
  if (value === undefined || value === null) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  throw new ValidationError(`${field} must be a string`, [{ field, message: 'Expected a string' }]);
}

/**
 * '' becomes null, for optional columns
 */
export function orNull(text: string): string | null {
  return text === '' ? null : text;
}

// Ids are Postgres INTEGER columns
export const MAX_ID = 2147483647;

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || value === '';
}

/**
 * Positive integer id within the column range, or null
 */
export function parseId(value: unknown): number | null {
  const text = typeof value === 'number' ? String(value) : typeof value === 'string' ? value.trim() : '';
  if (!/^\d+$/.test(text)) {
    return null;
  }
  const id = Number(text);
  return id >= 1 && id <= MAX_ID ? id : null;
}

/**
 * Read a referenced id from a request body.
 * Absent/blank reads as null; anything but a valid id is rejected.
 */
export function readId(value: unknown, field: string): number | null {
  if (isBlank(value)) {
    return null;
  }
  const id = parseId(value);
  if (id === null) {
    throw new ValidationError(`${field} must be a positive integer`, [{ field, message: 'Invalid id' }]);
  }
  return id;
}

/**
 * Read an id filter from a query string. Unparsable values drop the filter.
 */
export function readIdFilter(value: unknown): number | null {
  return isBlank(value) ? null : parseId(value);
}

// ======================
// FIELD RULES
// ======================

export function validateUsername(username: string): FieldError | null {
  if (username.length < MIN_USERNAME_LENGTH) {
    return { field: 'username', message: `Username must be at least ${MIN_USERNAME_LENGTH} characters` };
  }
  return null;
}

export function validatePassword(password: string, field: string = 'password'): FieldError | null {
  if (password.length < MIN_PASSWORD_LENGTH) {
    return { field, message: `Password must be at least ${MIN_PASSWORD_LENGTH} characters` };
  }
  return null;
}

export function isValidEmail(email: string): boolean {
  return EMAIL_PATTERN.test(email);
}

export function validateEmail(email: string): FieldError | null {
  if (!isValidEmail(email)) {
    return { field: 'email', message: 'Invalid email' };
  }
  return null;
}

export function isUserRole(value: string): value is UserRole {
  return USER_ROLES.some((role) => role === value);
}

export function validateRole(role: string): FieldError | null {
  if (!isUserRole(role)) {
    return { field: 'tipo_usuario', message: `tipo_usuario must be one of: ${USER_ROLES.join(', ')}` };
  }
  return null;
}

/**
 * Strip everything but digits from a CPF
 */
export function normalizeCpf(cpf: string): string {
  return cpf.replace(/\D/g, '');
}

/**
 * A CPF is valid when exactly 11 digits remain after stripping punctuation
 */
export function validateCpf(cpf: string): FieldError | null {
  if (!/^\d{11}$/.test(normalizeCpf(cpf))) {
    return { field: 'cpf', message: 'CPF must contain exactly 11 digits' };
  }
  return null;
}

/**
 * Phone numbers carry 10 or 11 digits (area code + number)
 */
export function validatePhone(phone: string): FieldError | null {
  const digits = phone.replace(/\D/g, '');
  if (digits.length < 10 || digits.length > 11) {
    return { field: 'telefone', message: 'Phone must contain 10 or 11 digits' };
  }
  return null;
}

export function validatePatientName(nome: string): FieldError | null {
  if (nome.length < MIN_PATIENT_NAME_LENGTH) {
    return { field: 'nome', message: `Name must be at least ${MIN_PATIENT_NAME_LENGTH} characters` };
  }
  return null;
}

// ======================
// COMBINATORS
// ======================

export function collectErrors(...results: Array<FieldError | null>): ValidationResult {
  const errors = results.filter((result): result is FieldError => result !== null);
  return { isValid: errors.length === 0, errors };
}

/**
 * Throw a ValidationError carrying every field error, headed by the first
 */
export function assertValid(result: ValidationResult): void {
  if (!result.isValid) {
    throw new ValidationError(result.errors[0].message, result.errors);
  }
}

export interface RegistrationInput {
  username: string;
  password: string;
  email: string;
  tipo_usuario: string;
}

/**
 * Validate a complete registration request
 */
export function validateRegistration(data: RegistrationInput): ValidationResult {
  if (!data.username || !data.password) {
    return {
      isValid: false,
      errors: [{ field: data.username ? 'password' : 'username', message: 'Username and password are required' }],
    };
  }

  return collectErrors(
    validateUsername(data.username),
    validatePassword(data.password),
    data.email ? validateEmail(data.email) : null,
    validateRole(data.tipo_usuario)
  );
}

/**
 * Path ids that are not positive integers name no record
 */
export function parseIdParam(value: string, notFound: NotFoundError): number {
  const id = parseId(value);
  if (id === null) {
    throw notFound;
  }
  return id;
}
