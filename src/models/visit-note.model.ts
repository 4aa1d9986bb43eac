/**
 * Visit Note (prontuário) Model
 */

import { query, Queryable } from './db';
import { VisitNote, VisitNoteFields } from '../types';

const NOTE_COLUMNS = `
  id, consulta_id, diagnostico, prescricao, exames_solicitados, observacoes_medicas, data_cadastro
`;

const NOTE_FIELDS: ReadonlyArray<keyof VisitNoteFields> = [
  'diagnostico',
  'prescricao',
  'exames_solicitados',
  'observacoes_medicas',
];

export async function insertVisitNote(
  db: Queryable,
  consultaId: number,
  fields: VisitNoteFields
): Promise<VisitNote> {
  const sql = `
    INSERT INTO prontuarios (consulta_id, diagnostico, prescricao, exames_solicitados, observacoes_medicas)
    VALUES ($1, $2, $3, $4, $5)
    RETURNING ${NOTE_COLUMNS}
  `;
  const result = await query<VisitNote>(db, sql, [
    consultaId,
    fields.diagnostico,
    fields.prescricao,
    fields.exames_solicitados,
    fields.observacoes_medicas,
  ]);
  return result.rows[0];
}

export async function findVisitNoteById(db: Queryable, id: number): Promise<VisitNote | null> {
  const result = await query<VisitNote>(db, `SELECT ${NOTE_COLUMNS} FROM prontuarios WHERE id = $1`, [id]);
  return result.rows[0] || null;
}

export async function findVisitNoteByAppointmentId(db: Queryable, consultaId: number): Promise<VisitNote | null> {
  const result = await query<VisitNote>(
    db,
    `SELECT ${NOTE_COLUMNS} FROM prontuarios WHERE consulta_id = $1 ORDER BY id ASC LIMIT 1`,
    [consultaId]
  );
  return result.rows[0] || null;
}

/**
 * Replace the provided fields; the others keep their value
 */
export async function updateVisitNote(
  db: Queryable,
  id: number,
  changes: Partial<VisitNoteFields>
): Promise<VisitNote | null> {
  const assignments: string[] = [];
  const params: unknown[] = [id];

  for (const field of NOTE_FIELDS) {
    if (field in changes) {
      params.push(changes[field] ?? null);
      assignments.push(`${field} = $${params.length}`);
    }
  }

  if (assignments.length === 0) {
    return findVisitNoteById(db, id);
  }

  const result = await query<VisitNote>(
    db,
    `UPDATE prontuarios SET ${assignments.join(', ')} WHERE id = $1 RETURNING ${NOTE_COLUMNS}`,
    params
  );
  return result.rows[0] || null;
}
