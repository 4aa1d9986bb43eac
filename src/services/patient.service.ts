/**
 * Patient Service
 *
 * Registration, search and soft delete of patients. Format rules run
 * first; uniqueness checks (cpf, email) run against the store afterwards.
 */

import { Queryable } from '../models/db';
import {
  findPatientByCpf,
  findPatientByEmail,
  findPatientById,
  insertPatient,
  listActivePatients,
  setPatientActive,
  updatePatient as updatePatientRow,
} from '../models/patient.model';
import { Page, Patient, PatientChanges } from '../types';
import { parseCalendarDate } from '../utils/date.utils';
import { ConflictError, NotFoundError, ValidationError } from '../utils/errors.utils';
import { createRequestContext, logInfo } from '../utils/logger.utils';
import { buildPagination, parsePageRequest } from '../utils/pagination.utils';
import {
  FieldError,
  assertValid,
  collectErrors,
  hasField,
  normalizeCpf,
  orNull,
  readText,
  validateCpf,
  validateEmail,
  validatePatientName,
  validatePhone,
} from '../utils/validation.utils';

export interface PatientListQuery {
  page?: unknown;
  per_page?: unknown;
  search?: unknown;
}

function validateBirthDate(text: string): FieldError | null {
  if (parseCalendarDate(text) === null) {
    return { field: 'data_nascimento', message: 'Invalid birth date. Use the format YYYY-MM-DD' };
  }
  return null;
}

function logPatientEvent(event: string, message: string, patientId: number): void {
  logInfo(event, message, createRequestContext(undefined, undefined, 'patient', patientId));
}

/**
 * The email must not belong to a different patient
 */
async function assertEmailAvailable(tx: Queryable, email: string, ownerId?: number): Promise<void> {
  const holder = await findPatientByEmail(tx, email);
  if (holder && holder.id !== ownerId) {
    throw new ConflictError('Email already in use', 'EMAIL_EXISTS');
  }
}

/**
 * Active patient or NotFoundError
 */
async function findActivePatient(tx: Queryable, id: number): Promise<Patient> {
  const patient = await findPatientById(tx, id);
  if (!patient || !patient.ativo) {
    throw new NotFoundError('Patient not found', 'PATIENT_NOT_FOUND');
  }
  return patient;
}

export async function createPatient(tx: Queryable, body: Record<string, unknown>): Promise<Patient> {
  const nome = readText(body, 'nome');
  const rawCpf = readText(body, 'cpf');
  const birthDate = readText(body, 'data_nascimento');
  const endereco = readText(body, 'endereco');
  const telefone = readText(body, 'telefone');
  const email = readText(body, 'email');

  if (!nome || !rawCpf) {
    throw new ValidationError('Name and CPF are required');
  }

  assertValid(
    collectErrors(
      validatePatientName(nome),
      validateCpf(rawCpf),
      email ? validateEmail(email) : null,
      telefone ? validatePhone(telefone) : null,
      birthDate ? validateBirthDate(birthDate) : null
    )
  );

  const cpf = normalizeCpf(rawCpf);
  if (await findPatientByCpf(tx, cpf)) {
    throw new ConflictError('A patient with this CPF already exists', 'CPF_EXISTS');
  }
  if (email) {
    await assertEmailAvailable(tx, email);
  }

  const patient = await insertPatient(tx, {
    nome,
    cpf,
    data_nascimento: orNull(birthDate),
    endereco: orNull(endereco),
    telefone: orNull(telefone),
    email: orNull(email),
  });

  logPatientEvent('patient.created', 'Patient registered', patient.id);
  return patient;
}

export async function listPatients(tx: Queryable, params: PatientListQuery): Promise<Page<Patient>> {
  const pageRequest = parsePageRequest(params.page, params.per_page);
  const search = typeof params.search === 'string' ? params.search.trim() : '';

  const { rows, total } = await listActivePatients(tx, {
    search: search || null,
    limit: pageRequest.limit,
    offset: pageRequest.offset,
  });

  return { items: rows, pagination: buildPagination(pageRequest, total) };
}

export async function getPatient(tx: Queryable, id: number): Promise<Patient> {
  return findActivePatient(tx, id);
}

/**
 * Partial update. Only the fields present in the body change; a blank
 * optional field clears the stored value.
 */
export async function updatePatient(tx: Queryable, id: number, body: Record<string, unknown>): Promise<Patient> {
  await findActivePatient(tx, id);

  const changes: PatientChanges = {};
  const errors: Array<FieldError | null> = [];

  if (hasField(body, 'nome')) {
    const nome = readText(body, 'nome');
    errors.push(validatePatientName(nome));
    changes.nome = nome;
  }

  if (hasField(body, 'data_nascimento')) {
    const birthDate = readText(body, 'data_nascimento');
    errors.push(birthDate ? validateBirthDate(birthDate) : null);
    changes.data_nascimento = orNull(birthDate);
  }

  if (hasField(body, 'endereco')) {
    changes.endereco = orNull(readText(body, 'endereco'));
  }

  if (hasField(body, 'telefone')) {
    const telefone = readText(body, 'telefone');
    errors.push(telefone ? validatePhone(telefone) : null);
    changes.telefone = orNull(telefone);
  }

  if (hasField(body, 'email')) {
    const email = readText(body, 'email');
    errors.push(email ? validateEmail(email) : null);
    changes.email = orNull(email);
  }

  assertValid(collectErrors(...errors));

  if (changes.email) {
    await assertEmailAvailable(tx, changes.email, id);
  }

  const updated = await updatePatientRow(tx, id, changes);
  if (!updated) {
    throw new NotFoundError('Patient not found', 'PATIENT_NOT_FOUND');
  }

  logPatientEvent('patient.updated', 'Patient updated', id);
  return updated;
}

/**
 * Soft delete: the record stays, flagged inactive
 */
export async function deactivatePatient(tx: Queryable, id: number): Promise<void> {
  await findActivePatient(tx, id);
  await setPatientActive(tx, id, false);
  logPatientEvent('patient.deactivated', 'Patient deactivated', id);
}

/**
 * Reactivating a patient that is already active is an error, not a no-op
 */
export async function reactivatePatient(tx: Queryable, id: number): Promise<Patient> {
  const patient = await findPatientById(tx, id);
  if (!patient) {
    throw new NotFoundError('Patient not found', 'PATIENT_NOT_FOUND');
  }
  if (patient.ativo) {
    throw new ValidationError('Patient is already active', undefined, 'PATIENT_ALREADY_ACTIVE');
  }

  const reactivated = await setPatientActive(tx, id, true);
  if (!reactivated) {
    throw new NotFoundError('Patient not found', 'PATIENT_NOT_FOUND');
  }

  logPatientEvent('patient.reactivated', 'Patient reactivated', id);
  return reactivated;
}
