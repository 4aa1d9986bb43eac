/**
 * Patient row as stored in the `pacientes` table.
 * `data_nascimento` is kept as the raw `YYYY-MM-DD` string (see db.ts).
 */
export interface Patient {
  id: number;
  nome: string;
  cpf: string;
  data_nascimento: string | null;
  endereco: string | null;
  telefone: string | null;
  email: string | null;
  ativo: boolean;
  data_cadastro: Date;
  data_atualizacao: Date;
}

export interface NewPatient {
  nome: string;
  cpf: string;
  data_nascimento: string | null;
  endereco: string | null;
  telefone: string | null;
  email: string | null;
}

/**
 * Fields a patient update may touch. The cpf is immutable.
 */
export type PatientChanges = Partial<Omit<NewPatient, 'cpf'>>;

export interface PatientSearch {
  search: string | null;
  limit: number;
  offset: number;
}
