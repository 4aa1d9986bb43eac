import { describe, expect, it } from 'vitest';
import { NotFoundError, ValidationError } from './errors.utils';
import {
  assertValid,
  collectErrors,
  normalizeCpf,
  MAX_ID,
  parseIdParam,
  readId,
  readIdFilter,
  readSecret,
  readText,
  requireBody,
  validateCpf,
  validateEmail,
  validatePhone,
  validateRegistration,
} from './validation.utils';

describe('body readers', () => {
  it('rejects bodies that are not JSON objects', () => {
    expect(() => requireBody([1, 2])).toThrow(ValidationError);
    expect(() => requireBody(null)).toThrow('Request body must be a JSON object');
    expect(requireBody({ nome: 'Ana' })).toEqual({ nome: 'Ana' });
  });

  it('trims text and stringifies numbers', () => {
    const body = { nome: '  Ana Souza ', cpf: 12345678901, vazio: null };
    expect(readText(body, 'nome')).toBe('Ana Souza');
    expect(readText(body, 'cpf')).toBe('12345678901');
    expect(readText(body, 'vazio')).toBe('');
    expect(readText(body, 'ausente')).toBe('');
  });

  it('refuses objects where text is expected', () => {
    expect(() => readText({ nome: { first: 'Ana' } }, 'nome')).toThrow('nome must be a string');
  });

  it('reads passwords untrimmed', () => {
    expect(readSecret({ password: ' secret ' }, 'password')).toBe(' secret ');
    expect(() => readSecret({ password: 123456 }, 'password')).toThrow(ValidationError);
  });

  it('reads positive integer ids', () => {
    expect(readId(7, 'paciente_id')).toBe(7);
    expect(readId(' 12 ', 'paciente_id')).toBe(12);
    expect(readId('', 'paciente_id')).toBeNull();
    expect(readId(undefined, 'paciente_id')).toBeNull();
    expect(() => readId('0', 'paciente_id')).toThrow('paciente_id must be a positive integer');
    expect(() => readId('abc', 'medico_id')).toThrow('medico_id must be a positive integer');
    expect(() => readId(1.5, 'medico_id')).toThrow(ValidationError);
  });

  it('rejects ids beyond the integer column range', () => {
    expect(readId(String(MAX_ID), 'paciente_id')).toBe(2147483647);
    expect(() => readId('2147483648', 'paciente_id')).toThrow('paciente_id must be a positive integer');
    expect(() => readId('99999999999999999999', 'paciente_id')).toThrow(ValidationError);
    expect(() => readId(2147483648, 'medico_id')).toThrow(ValidationError);
  });

  it('drops id filters it cannot parse', () => {
    expect(readIdFilter('3')).toBe(3);
    expect(readIdFilter('abc')).toBeNull();
    expect(readIdFilter('3000000000')).toBeNull();
    expect(readIdFilter(undefined)).toBeNull();
  });
});

describe('field rules', () => {
  it('accepts a CPF with punctuation and strips it', () => {
    expect(validateCpf('123.456.789-01')).toBeNull();
    expect(normalizeCpf('123.456.789-01')).toBe('12345678901');
  });

  it('rejects a CPF without exactly 11 digits', () => {
    expect(validateCpf('1234567890')).toEqual({ field: 'cpf', message: 'CPF must contain exactly 11 digits' });
    expect(validateCpf('123456789012')).not.toBeNull();
  });

  it('accepts phones with 10 or 11 digits', () => {
    expect(validatePhone('(11) 3456-7890')).toBeNull();
    expect(validatePhone('11 98765-4321')).toBeNull();
    expect(validatePhone('123456789')).toEqual({ field: 'telefone', message: 'Phone must contain 10 or 11 digits' });
  });

  it('checks email shape', () => {
    expect(validateEmail('ana@example.com')).toBeNull();
    expect(validateEmail('ana@example')).toEqual({ field: 'email', message: 'Invalid email' });
  });
});

describe('validateRegistration', () => {
  const valid = { username: 'drhouse', password: 'secret1', email: '', tipo_usuario: 'doctor' };

  it('passes a complete request', () => {
    expect(validateRegistration(valid)).toEqual({ isValid: true, errors: [] });
  });

  it('reports missing credentials before anything else', () => {
    const result = validateRegistration({ ...valid, password: '' });
    expect(result.isValid).toBe(false);
    expect(result.errors).toEqual([{ field: 'password', message: 'Username and password are required' }]);
  });

  it('collects every broken rule', () => {
    const result = validateRegistration({ username: 'ab', password: '123', email: 'nope', tipo_usuario: 'nurse' });
    expect(result.errors.map((error) => error.field)).toEqual(['username', 'password', 'email', 'tipo_usuario']);
    expect(result.errors[0].message).toBe('Username must be at least 3 characters');
  });
});

describe('assertValid', () => {
  it('throws the first message and carries all errors as details', () => {
    const result = collectErrors(validateCpf('1'), null, validatePhone('1'));
    try {
      assertValid(result);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.message).toBe('CPF must contain exactly 11 digits');
        expect(error.details).toEqual(result.errors);
        expect(error.status).toBe(400);
      }
    }
  });

  it('does nothing for a valid result', () => {
    expect(() => assertValid(collectErrors(null, null))).not.toThrow();
  });
});

describe('parseIdParam', () => {
  const notFound = new NotFoundError('Patient not found', 'PATIENT_NOT_FOUND');

  it('parses numeric path ids', () => {
    expect(parseIdParam('42', notFound)).toBe(42);
  });

  it('treats anything else as an unknown record', () => {
    expect(() => parseIdParam('abc', notFound)).toThrow(notFound);
    expect(() => parseIdParam('0', notFound)).toThrow(notFound);
    expect(() => parseIdParam('99999999999999999999', notFound)).toThrow(notFound);
    expect(() => parseIdParam('2147483648', notFound)).toThrow(notFound);
    expect(parseIdParam('2147483647', notFound)).toBe(2147483647);
  });
});
