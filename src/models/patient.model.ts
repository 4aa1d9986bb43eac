/**
 * Patient Model
 *
 * Database operations for the `pacientes` table. "Deleting" a patient
 * only clears `ativo`; rows are never removed.
 */

import { query, Queryable } from './db';
import { NewPatient, Patient, PatientChanges, PatientSearch } from '../types';

const PATIENT_COLUMNS = `
  id, nome, cpf, data_nascimento, endereco, telefone, email, ativo, data_cadastro, data_atualizacao
`;

// Order matters: it fixes the SET clause order in updatePatient
const UPDATABLE_COLUMNS: ReadonlyArray<keyof PatientChanges> = [
  'nome',
  'data_nascimento',
  'endereco',
  'telefone',
  'email',
];

/**
 * Escape LIKE wildcards so a search for "50%" matches literally
 */
function escapeLike(text: string): string {
  return text.replace(/[\\%_]/g, (char) => `\\${char}`);
}

export async function insertPatient(db: Queryable, data: NewPatient): Promise<Patient> {
  const sql = `
    INSERT INTO pacientes (nome, cpf, data_nascimento, endereco, telefone, email)
    VALUES ($1, $2, $3, $4, $5, $6)
    RETURNING ${PATIENT_COLUMNS}
  `;
  const result = await query<Patient>(db, sql, [
    data.nome,
    data.cpf,
    data.data_nascimento,
    data.endereco,
    data.telefone,
    data.email,
  ]);
  return result.rows[0];
}

/**
 * Find a patient by id, active or not
 */
export async function findPatientById(db: Queryable, id: number): Promise<Patient | null> {
  const result = await query<Patient>(db, `SELECT ${PATIENT_COLUMNS} FROM pacientes WHERE id = $1`, [id]);
  return result.rows[0] || null;
}

export async function findPatientByCpf(db: Queryable, cpf: string): Promise<Patient | null> {
  const result = await query<Patient>(db, `SELECT ${PATIENT_COLUMNS} FROM pacientes WHERE cpf = $1`, [cpf]);
  return result.rows[0] || null;
}

export async function findPatientByEmail(db: Queryable, email: string): Promise<Patient | null> {
  const result = await query<Patient>(db, `SELECT ${PATIENT_COLUMNS} FROM pacientes WHERE email = $1`, [email]);
  return result.rows[0] || null;
}

/**
 * Active patients, oldest first. `search` matches the name
 * (case-insensitive) or the CPF.
 */
export async function listActivePatients(
  db: Queryable,
  options: PatientSearch
): Promise<{ rows: Patient[]; total: number }> {
  const conditions = ['ativo = TRUE'];
  const params: unknown[] = [];

  if (options.search) {
    params.push(`%${escapeLike(options.search)}%`);
    conditions.push(`(nome ILIKE $${params.length} OR cpf LIKE $${params.length})`);
  }

  const where = conditions.join(' AND ');

  const countResult = await query<{ total: string }>(
    db,
    `SELECT COUNT(*) AS total FROM pacientes WHERE ${where}`,
    params
  );

  const pageParams = [...params, options.limit, options.offset];
  const result = await query<Patient>(
    db,
    `SELECT ${PATIENT_COLUMNS} FROM pacientes
     WHERE ${where}
     ORDER BY id ASC
     LIMIT $${pageParams.length - 1} OFFSET $${pageParams.length}`,
    pageParams
  );

  return { rows: result.rows, total: parseInt(countResult.rows[0]?.total ?? '0', 10) };
}

/**
 * Apply the provided changes; untouched columns keep their value
 */
export async function updatePatient(db: Queryable, id: number, changes: PatientChanges): Promise<Patient | null> {
  const assignments: string[] = [];
  const params: unknown[] = [id];

  for (const column of UPDATABLE_COLUMNS) {
    if (column in changes) {
      params.push(changes[column] ?? null);
      assignments.push(`${column} = $${params.length}`);
    }
  }
  assignments.push('data_atualizacao = NOW()');

  const result = await query<Patient>(
    db,
    `UPDATE pacientes SET ${assignments.join(', ')} WHERE id = $1 RETURNING ${PATIENT_COLUMNS}`,
    params
  );
  return result.rows[0] || null;
}

export async function setPatientActive(db: Queryable, id: number, active: boolean): Promise<Patient | null> {
  const result = await query<Patient>(
    db,
    `UPDATE pacientes SET ativo = $2, data_atualizacao = NOW() WHERE id = $1 RETURNING ${PATIENT_COLUMNS}`,
    [id, active]
  );
  return result.rows[0] || null;
}
