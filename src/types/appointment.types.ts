import type { Patient } from './patient.types';

export type AppointmentStatus = 'scheduled' | 'completed' | 'cancelled';
export type AppointmentModality = 'in-person' | 'remote';

export const APPOINTMENT_STATUSES: readonly AppointmentStatus[] = ['scheduled', 'completed', 'cancelled'];
export const APPOINTMENT_MODALITIES: readonly AppointmentModality[] = ['in-person', 'remote'];

/**
 * Appointment row as stored in the `consultas` table.
 * `data_consulta` is the naive local timestamp `YYYY-MM-DD HH:MM:SS`.
 */
export interface Appointment {
  id: number;
  paciente_id: number;
  medico_id: number;
  data_consulta: string;
  tipo_consulta: AppointmentModality;
  status: AppointmentStatus;
  observacoes: string | null;
  data_cadastro: Date;
  data_atualizacao: Date;
}

export interface NewAppointment {
  paciente_id: number;
  medico_id: number;
  data_consulta: string;
  tipo_consulta: AppointmentModality;
  observacoes: string | null;
}

/**
 * List rows are joined with the patient name and provider username
 */
export interface AppointmentListRow extends Appointment {
  paciente_nome: string;
  medico_nome: string;
}

export interface AppointmentFilters {
  paciente_id: number | null;
  medico_id: number | null;
  status: AppointmentStatus | null;
  /** Inclusive lower bound, `YYYY-MM-DD` */
  from: string | null;
  /** Exclusive upper bound, `YYYY-MM-DD` */
  until: string | null;
}

/**
 * Visit note (prontuário) row as stored in the `prontuarios` table.
 */
export interface VisitNote {
  id: number;
  consulta_id: number;
  diagnostico: string | null;
  prescricao: string | null;
  exames_solicitados: string | null;
  observacoes_medicas: string | null;
  data_cadastro: Date;
}

export type VisitNoteFields = Pick<
  VisitNote,
  'diagnostico' | 'prescricao' | 'exames_solicitados' | 'observacoes_medicas'
>;

export interface ProviderSummary {
  id: number;
  username: string;
  email: string | null;
}

export interface AppointmentDetail extends Appointment {
  paciente: Patient | null;
  medico: ProviderSummary | null;
  prontuario?: VisitNote;
}
