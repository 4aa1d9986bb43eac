/**
 * Appointment Model
 *
 * Database operations for scheduling (`consultas`).
 */

import { query, Queryable } from './db';
import {
  Appointment,
  AppointmentFilters,
  AppointmentListRow,
  AppointmentStatus,
  NewAppointment,
} from '../types';

const APPOINTMENT_COLUMNS = `
  c.id, c.paciente_id, c.medico_id, c.data_consulta, c.tipo_consulta, c.status,
  c.observacoes, c.data_cadastro, c.data_atualizacao
`;

// Arbitrary namespace for the provider schedule advisory locks
const SCHEDULE_LOCK_NAMESPACE = 4201;

export async function insertAppointment(db: Queryable, data: NewAppointment): Promise<Appointment> {
  const sql = `
    INSERT INTO consultas AS c (paciente_id, medico_id, data_consulta, tipo_consulta, observacoes)
    VALUES ($1, $2, $3, $4, $5)
    RETURNING ${APPOINTMENT_COLUMNS}
  `;
  const result = await query<Appointment>(db, sql, [
    data.paciente_id,
    data.medico_id,
    data.data_consulta,
    data.tipo_consulta,
    data.observacoes,
  ]);
  return result.rows[0];
}

/**
 * @param options.forUpdate - lock the row until the transaction ends
 */
export async function findAppointmentById(
  db: Queryable,
  id: number,
  options: { forUpdate?: boolean } = {}
): Promise<Appointment | null> {
  const result = await query<Appointment>(
    db,
    `SELECT ${APPOINTMENT_COLUMNS} FROM consultas c WHERE c.id = $1${options.forUpdate ? ' FOR UPDATE' : ''}`,
    [id]
  );
  return result.rows[0] || null;
}

/**
 * Serialize scheduling for one provider until the transaction ends
 */
export async function lockProviderSchedule(db: Queryable, medicoId: number): Promise<void> {
  await query(db, 'SELECT pg_advisory_xact_lock($1, $2)', [SCHEDULE_LOCK_NAMESPACE, medicoId]);
}

/**
 * The scheduled appointment holding this provider's slot, if any
 */
export async function findScheduledAppointmentAt(
  db: Queryable,
  medicoId: number,
  dataConsulta: string
): Promise<Appointment | null> {
  const result = await query<Appointment>(
    db,
    `SELECT ${APPOINTMENT_COLUMNS} FROM consultas c
     WHERE c.medico_id = $1 AND c.data_consulta = $2 AND c.status = 'scheduled'
     LIMIT 1`,
    [medicoId, dataConsulta]
  );
  return result.rows[0] || null;
}

/**
 * Filtered page of appointments, newest slot first, joined with the
 * patient name and provider username
 */
export async function listAppointments(
  db: Queryable,
  filters: AppointmentFilters,
  page: { limit: number; offset: number }
): Promise<{ rows: AppointmentListRow[]; total: number }> {
  const conditions: string[] = [];
  const params: unknown[] = [];

  if (filters.paciente_id !== null) {
    params.push(filters.paciente_id);
    conditions.push(`c.paciente_id = $${params.length}`);
  }
  if (filters.medico_id !== null) {
    params.push(filters.medico_id);
    conditions.push(`c.medico_id = $${params.length}`);
  }
  if (filters.status !== null) {
    params.push(filters.status);
    conditions.push(`c.status = $${params.length}`);
  }
  if (filters.from !== null) {
    params.push(filters.from);
    conditions.push(`c.data_consulta >= $${params.length}::timestamp`);
  }
  if (filters.until !== null) {
    params.push(filters.until);
    conditions.push(`c.data_consulta < $${params.length}::timestamp`);
  }

  const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';

  const countResult = await query<{ total: string }>(
    db,
    `SELECT COUNT(*) AS total FROM consultas c ${where}`,
    params
  );

  const pageParams = [...params, page.limit, page.offset];
  const result = await query<AppointmentListRow>(
    db,
    `SELECT ${APPOINTMENT_COLUMNS},
            p.nome AS paciente_nome,
            u.username AS medico_nome
     FROM consultas c
     JOIN pacientes p ON p.id = c.paciente_id
     JOIN users u ON u.id = c.medico_id
     ${where}
     ORDER BY c.data_consulta DESC, c.id DESC
     LIMIT $${pageParams.length - 1} OFFSET $${pageParams.length}`,
    pageParams
  );

  return { rows: result.rows, total: parseInt(countResult.rows[0]?.total ?? '0', 10) };
}

export async function updateAppointmentStatus(
  db: Queryable,
  id: number,
  status: AppointmentStatus
): Promise<Appointment | null> {
  const result = await query<Appointment>(
    db,
    `UPDATE consultas AS c SET status = $2, data_atualizacao = NOW()
     WHERE c.id = $1
     RETURNING ${APPOINTMENT_COLUMNS}`,
    [id, status]
  );
  return result.rows[0] || null;
}
