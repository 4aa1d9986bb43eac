/**
 * Appointment Service
 *
 * Scheduling, listing and status changes for appointments (consultas),
 * plus the visit note (prontuário) recorded once per appointment.
 *
 * A provider slot (medico_id + data_consulta) can hold only one
 * `scheduled` appointment. Scheduling takes a per-provider advisory lock
 * before looking for a collision, and note creation locks the appointment
 * row, so two concurrent requests cannot both pass the check.
 */

import { Queryable } from '../models/db';
import {
  findAppointmentById,
  findScheduledAppointmentAt,
  insertAppointment,
  listAppointments as listAppointmentRows,
  lockProviderSchedule,
  updateAppointmentStatus as updateAppointmentStatusRow,
} from '../models/appointment.model';
import { findPatientById } from '../models/patient.model';
import { findUserById } from '../models/user.model';
import {
  findVisitNoteByAppointmentId,
  findVisitNoteById,
  insertVisitNote,
  updateVisitNote as updateVisitNoteRow,
} from '../models/visit-note.model';
import {
  APPOINTMENT_MODALITIES,
  APPOINTMENT_STATUSES,
  Appointment,
  AppointmentDetail,
  AppointmentFilters,
  AppointmentListRow,
  AppointmentModality,
  AppointmentStatus,
  Page,
  VisitNote,
  VisitNoteFields,
} from '../types';
import { nextCalendarDay, parseAppointmentTime, parseCalendarDate } from '../utils/date.utils';
import { ConflictError, NotFoundError, ValidationError } from '../utils/errors.utils';
import { createRequestContext, logInfo } from '../utils/logger.utils';
import { buildPagination, parsePageRequest } from '../utils/pagination.utils';
import { hasField, orNull, readId, readIdFilter, readText } from '../utils/validation.utils';

const DEFAULT_MODALITY: AppointmentModality = 'in-person';

const NOTE_FIELDS: ReadonlyArray<keyof VisitNoteFields> = [
  'diagnostico',
  'prescricao',
  'exames_solicitados',
  'observacoes_medicas',
];

export interface AppointmentListQuery {
  page?: unknown;
  per_page?: unknown;
  paciente_id?: unknown;
  medico_id?: unknown;
  status?: unknown;
  data_inicio?: unknown;
  data_fim?: unknown;
}

export function isAppointmentStatus(value: string): value is AppointmentStatus {
  return APPOINTMENT_STATUSES.some((status) => status === value);
}

export function isAppointmentModality(value: string): value is AppointmentModality {
  return APPOINTMENT_MODALITIES.some((modality) => modality === value);
}

async function findAppointmentOrFail(tx: Queryable, id: number, forUpdate: boolean = false): Promise<Appointment> {
  const appointment = await findAppointmentById(tx, id, { forUpdate });
  if (!appointment) {
    throw new NotFoundError('Appointment not found', 'APPOINTMENT_NOT_FOUND');
  }
  return appointment;
}

/**
 * Query-string filters. An unparsable id or unknown status is ignored;
 * a malformed date is an error.
 */
function parseFilters(params: AppointmentListQuery): AppointmentFilters {
  const status = typeof params.status === 'string' ? params.status.trim() : '';
  const start = typeof params.data_inicio === 'string' ? params.data_inicio.trim() : '';
  const end = typeof params.data_fim === 'string' ? params.data_fim.trim() : '';

  let from: string | null = null;
  if (start) {
    from = parseCalendarDate(start);
    if (from === null) {
      throw new ValidationError('Invalid start date. Use the format YYYY-MM-DD');
    }
  }

  let until: string | null = null;
  if (end) {
    const endDate = parseCalendarDate(end);
    if (endDate === null) {
      throw new ValidationError('Invalid end date. Use the format YYYY-MM-DD');
    }
    until = nextCalendarDay(endDate);
  }

  return {
    paciente_id: readIdFilter(params.paciente_id),
    medico_id: readIdFilter(params.medico_id),
    status: isAppointmentStatus(status) ? status : null,
    from,
    until,
  };
}

export async function scheduleAppointment(
  tx: Queryable,
  body: Record<string, unknown>,
  now: Date = new Date()
): Promise<Appointment> {
  const pacienteId = readId(body.paciente_id, 'paciente_id');
  const medicoId = readId(body.medico_id, 'medico_id');
  const when = readText(body, 'data_consulta');
  const modality = readText(body, 'tipo_consulta') || DEFAULT_MODALITY;
  const observacoes = readText(body, 'observacoes');

  if (pacienteId === null || medicoId === null || !when) {
    throw new ValidationError('Patient, provider and appointment time are required');
  }

  const patient = await findPatientById(tx, pacienteId);
  if (!patient || !patient.ativo) {
    throw new NotFoundError('Patient not found', 'PATIENT_NOT_FOUND');
  }

  // Provider only has to exist; inactive accounts can still be booked
  const provider = await findUserById(tx, medicoId);
  if (!provider) {
    throw new NotFoundError('Provider not found', 'PROVIDER_NOT_FOUND');
  }

  if (!isAppointmentModality(modality)) {
    throw new ValidationError(`tipo_consulta must be one of: ${APPOINTMENT_MODALITIES.join(', ')}`);
  }

  const slot = parseAppointmentTime(when);
  if (slot === null) {
    throw new ValidationError('Invalid appointment time. Use the format YYYY-MM-DD HH:MM');
  }
  if (slot.date.getTime() < now.getTime()) {
    throw new ValidationError('Cannot schedule an appointment in the past');
  }

  await lockProviderSchedule(tx, medicoId);
  if (await findScheduledAppointmentAt(tx, medicoId, slot.timestamp)) {
    throw new ConflictError('Provider already has an appointment scheduled at this time', 'SLOT_TAKEN');
  }

  const appointment = await insertAppointment(tx, {
    paciente_id: pacienteId,
    medico_id: medicoId,
    data_consulta: slot.timestamp,
    tipo_consulta: modality,
    observacoes: orNull(observacoes),
  });

  logInfo(
    'appointment.scheduled',
    'Appointment scheduled',
    createRequestContext(undefined, medicoId, 'appointment', appointment.id),
    { modality }
  );
  return appointment;
}

export async function listAppointments(
  tx: Queryable,
  params: AppointmentListQuery
): Promise<Page<AppointmentListRow>> {
  const pageRequest = parsePageRequest(params.page, params.per_page);
  const filters = parseFilters(params);

  const { rows, total } = await listAppointmentRows(tx, filters, {
    limit: pageRequest.limit,
    offset: pageRequest.offset,
  });

  return { items: rows, pagination: buildPagination(pageRequest, total) };
}

/**
 * Appointment with its patient, provider summary and visit note
 */
export async function getAppointment(tx: Queryable, id: number): Promise<AppointmentDetail> {
  const appointment = await findAppointmentOrFail(tx, id);

  // One client per transaction: run these one after another
  const patient = await findPatientById(tx, appointment.paciente_id);
  const provider = await findUserById(tx, appointment.medico_id);
  const note = await findVisitNoteByAppointmentId(tx, appointment.id);

  const detail: AppointmentDetail = {
    ...appointment,
    paciente: patient,
    medico: provider ? { id: provider.id, username: provider.username, email: provider.email } : null,
  };
  if (note) {
    detail.prontuario = note;
  }
  return detail;
}

/**
 * Any status can move to any other
 */
export async function updateAppointmentStatus(
  tx: Queryable,
  id: number,
  body: Record<string, unknown>
): Promise<Appointment> {
  await findAppointmentOrFail(tx, id);

  const status = readText(body, 'status');
  if (!isAppointmentStatus(status)) {
    throw new ValidationError(`status must be one of: ${APPOINTMENT_STATUSES.join(', ')}`);
  }

  const updated = await updateAppointmentStatusRow(tx, id, status);
  if (!updated) {
    throw new NotFoundError('Appointment not found', 'APPOINTMENT_NOT_FOUND');
  }

  logInfo(
    'appointment.status_changed',
    'Appointment status changed',
    createRequestContext(undefined, undefined, 'appointment', id),
    { status }
  );
  return updated;
}

/**
 * Record the visit note. The appointment becomes `completed`.
 */
export async function createVisitNote(
  tx: Queryable,
  appointmentId: number,
  body: Record<string, unknown>
): Promise<VisitNote> {
  const appointment = await findAppointmentOrFail(tx, appointmentId, true);

  if (await findVisitNoteByAppointmentId(tx, appointment.id)) {
    throw new ConflictError('This appointment already has a visit note', 'NOTE_EXISTS');
  }

  const note = await insertVisitNote(tx, appointment.id, {
    diagnostico: orNull(readText(body, 'diagnostico')),
    prescricao: orNull(readText(body, 'prescricao')),
    exames_solicitados: orNull(readText(body, 'exames_solicitados')),
    observacoes_medicas: orNull(readText(body, 'observacoes_medicas')),
  });

  await updateAppointmentStatusRow(tx, appointment.id, 'completed');

  logInfo('visit_note.created', 'Visit note recorded', createRequestContext(undefined, undefined, 'visit_note', note.id));
  return note;
}

/**
 * Each field present in the body replaces the stored value; blank clears it
 */
export async function updateVisitNote(
  tx: Queryable,
  noteId: number,
  body: Record<string, unknown>
): Promise<VisitNote> {
  const existing = await findVisitNoteById(tx, noteId);
  if (!existing) {
    throw new NotFoundError('Visit note not found', 'NOTE_NOT_FOUND');
  }

  const changes: Partial<VisitNoteFields> = {};
  for (const field of NOTE_FIELDS) {
    if (hasField(body, field)) {
      changes[field] = orNull(readText(body, field));
    }
  }

  const updated = await updateVisitNoteRow(tx, noteId, changes);
  if (!updated) {
    throw new NotFoundError('Visit note not found', 'NOTE_NOT_FOUND');
  }

  logInfo('visit_note.updated', 'Visit note updated', createRequestContext(undefined, undefined, 'visit_note', noteId));
  return updated;
}
