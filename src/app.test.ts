import type { Server } from 'http';
import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import { createApp } from './app';
import type { Queryable } from './models/db';
import { resetMemoryDb } from './test/memory-db';
import { isRecord } from './utils/validation.utils';

vi.mock('./models/user.model', async () => (await import('./test/memory-db')).userModel);
vi.mock('./models/patient.model', async () => (await import('./test/memory-db')).patientModel);
vi.mock('./models/appointment.model', async () => (await import('./test/memory-db')).appointmentModel);
vi.mock('./models/visit-note.model', async () => (await import('./test/memory-db')).visitNoteModel);
vi.mock('./models/db', async () => {
  const { memoryTx } = await import('./test/memory-db');
  return {
    withTransaction: <T>(work: (tx: Queryable) => Promise<T>): Promise<T> => work(memoryTx),
  };
});

let server: Server;
let baseUrl = '';
let token = '';

interface CallOptions {
  body?: unknown;
  rawBody?: string;
  auth?: string | null;
}

async function call(method: string, path: string, options: CallOptions = {}) {
  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  const auth = options.auth === undefined ? token : options.auth;
  if (auth) {
    headers.Authorization = `Bearer ${auth}`;
  }
  const payload = options.rawBody ?? (options.body === undefined ? undefined : JSON.stringify(options.body));
  const response = await fetch(`${baseUrl}${path}`, { method, headers, body: payload });
  const body: unknown = await response.json();
  return { status: response.status, body };
}

/**
 * Walk a dotted path through a JSON body
 */
function pick(value: unknown, path: string): unknown {
  return path.split('.').reduce<unknown>((current, key) => {
    if (Array.isArray(current)) {
      return current[Number(key)];
    }
    return isRecord(current) ? current[key] : undefined;
  }, value);
}

beforeAll(async () => {
  resetMemoryDb();
  server = createApp().listen(0);
  await new Promise<void>((resolve) => server.once('listening', () => resolve()));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server is not listening on a TCP port');
  }
  baseUrl = `http://127.0.0.1:${address.port}/api`;

  await call('POST', '/register', {
    auth: null,
    body: { username: 'drlima', password: 'secret1', email: 'lima@example.com', tipo_usuario: 'doctor' },
  });
  const login = await call('POST', '/login', { auth: null, body: { username: 'drlima', password: 'secret1' } });
  const issued = pick(login.body, 'data.token');
  if (typeof issued !== 'string') {
    throw new Error('Login did not return a token');
  }
  token = issued;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
});

describe('HTTP API', () => {
  it('reports its status without a token', async () => {
    const { status, body } = await call('GET', '/status', { auth: null });

    expect(status).toBe(200);
    expect(body).toMatchObject({ success: true, data: { status: 'online', version: '1.0.0' } });
  });

  describe('authentication', () => {
    it('returns the account and token on login', async () => {
      const { status, body } = await call('POST', '/login', {
        auth: null,
        body: { username: 'drlima', password: 'secret1' },
      });

      expect(status).toBe(200);
      expect(body).toMatchObject({
        success: true,
        message: 'Logged in',
        data: { user: { id: 1, username: 'drlima', tipo_usuario: 'doctor', ativo: true }, expiresAt: null },
      });
      expect(pick(body, 'data.user.password_hash')).toBeUndefined();
    });

    it('rejects bad credentials with 401', async () => {
      const { status, body } = await call('POST', '/login', {
        auth: null,
        body: { username: 'drlima', password: 'wrong-1' },
      });

      expect(status).toBe(401);
      expect(body).toEqual({
        success: false,
        error: { code: 'INVALID_CREDENTIALS', message: 'Invalid username or password' },
      });
    });

    it('requires a token on protected routes', async () => {
      const { status, body } = await call('GET', '/pacientes', { auth: null });

      expect(status).toBe(401);
      expect(body).toEqual({
        success: false,
        error: { code: 'UNAUTHORIZED', message: 'Authorization token required' },
      });
    });

    it('rejects an invalid token', async () => {
      const { status, body } = await call('GET', '/profile', { auth: 'not-a-token' });

      expect(status).toBe(401);
      expect(pick(body, 'error.code')).toBe('INVALID_TOKEN');
    });

    it('returns the caller profile', async () => {
      const { status, body } = await call('GET', '/profile');

      expect(status).toBe(200);
      expect(pick(body, 'data.user.email')).toBe('lima@example.com');
    });

    it('reports a taken username with 409', async () => {
      const { status, body } = await call('POST', '/register', {
        auth: null,
        body: { username: 'drlima', password: 'secret1' },
      });

      expect(status).toBe(409);
      expect(pick(body, 'error.code')).toBe('USERNAME_EXISTS');
    });
  });

  describe('request errors', () => {
    it('answers malformed JSON with 400', async () => {
      const { status, body } = await call('POST', '/login', { auth: null, rawBody: '{"username":' });

      expect(status).toBe(400);
      expect(body).toEqual({
        success: false,
        error: { code: 'INVALID_JSON', message: 'Request body is not valid JSON' },
      });
    });

    it('answers a body over the size limit with 413', async () => {
      const { status, body } = await call('POST', '/register', {
        auth: null,
        body: { username: 'drbig', password: 'secret1', email: 'x'.repeat(1024 * 1024) },
      });

      expect(status).toBe(413);
      expect(pick(body, 'error.code')).toBe('PAYLOAD_TOO_LARGE');
    });

    it('refuses a body that is not an object', async () => {
      const { status, body } = await call('POST', '/login', { auth: null, body: ['drlima'] });

      expect(status).toBe(400);
      expect(pick(body, 'error.code')).toBe('INVALID_BODY');
    });

    it('answers unknown routes with 404', async () => {
      const { status, body } = await call('GET', '/nowhere');

      expect(status).toBe(404);
      expect(body).toEqual({
        success: false,
        error: { code: 'NOT_FOUND', message: 'Route GET /api/nowhere not found' },
      });
    });

    it('treats a non-numeric id as an unknown record', async () => {
      const { status, body } = await call('GET', '/pacientes/abc');

      expect(status).toBe(404);
      expect(pick(body, 'error.code')).toBe('PATIENT_NOT_FOUND');
    });

    it('treats an id beyond the integer range as an unknown record', async () => {
      const { status, body } = await call('GET', '/pacientes/2147483648');

      expect(status).toBe(404);
      expect(pick(body, 'error.code')).toBe('PATIENT_NOT_FOUND');
    });

    it('carries field errors as details', async () => {
      const { status, body } = await call('POST', '/pacientes', { body: { nome: 'Ana Souza', cpf: '123' } });

      expect(status).toBe(400);
      expect(body).toEqual({
        success: false,
        error: {
          code: 'VALIDATION_ERROR',
          message: 'CPF must contain exactly 11 digits',
          details: [{ field: 'cpf', message: 'CPF must contain exactly 11 digits' }],
        },
      });
    });
  });

  describe('patient to visit note', () => {
    it('runs a patient through scheduling and the visit note', async () => {
      const created = await call('POST', '/pacientes', {
        body: { nome: 'Ana Souza', cpf: '123.456.789-01', telefone: '11987654321' },
      });
      expect(created.status).toBe(201);
      expect(pick(created.body, 'data.paciente.cpf')).toBe('12345678901');
      const pacienteId = pick(created.body, 'data.paciente.id');

      const listed = await call('GET', '/pacientes?search=ana&per_page=5');
      expect(listed.status).toBe(200);
      expect(pick(listed.body, 'data.pagination')).toEqual({
        page: 1,
        per_page: 5,
        total: 1,
        pages: 1,
        has_next: false,
        has_prev: false,
      });

      const scheduled = await call('POST', '/consultas', {
        body: { paciente_id: pacienteId, medico_id: 1, data_consulta: '2099-06-01 10:00', tipo_consulta: 'remote' },
      });
      expect(scheduled.status).toBe(201);
      expect(pick(scheduled.body, 'data.consulta')).toMatchObject({
        data_consulta: '2099-06-01 10:00:00',
        tipo_consulta: 'remote',
        status: 'scheduled',
      });
      const consultaId = pick(scheduled.body, 'data.consulta.id');

      const clash = await call('POST', '/consultas', {
        body: { paciente_id: pacienteId, medico_id: 1, data_consulta: '2099-06-01 10:00' },
      });
      expect(clash.status).toBe(409);
      expect(pick(clash.body, 'error.code')).toBe('SLOT_TAKEN');

      const note = await call('POST', `/consultas/${String(consultaId)}/prontuario`, {
        body: { diagnostico: 'Gripe', prescricao: 'Repouso' },
      });
      expect(note.status).toBe(201);
      const noteId = pick(note.body, 'data.prontuario.id');

      const edited = await call('PUT', `/prontuarios/${String(noteId)}`, { body: { prescricao: 'Repouso e hidratação' } });
      expect(edited.status).toBe(200);
      expect(pick(edited.body, 'data.prontuario')).toMatchObject({
        diagnostico: 'Gripe',
        prescricao: 'Repouso e hidratação',
      });

      const longNote = 'Paciente relata tosse persistente. '.repeat(600);
      const long = await call('PUT', `/prontuarios/${String(noteId)}`, { body: { observacoes_medicas: longNote } });
      expect(long.status).toBe(200);
      expect(pick(long.body, 'data.prontuario.observacoes_medicas')).toBe(longNote.trim());

      const detail = await call('GET', `/consultas/${String(consultaId)}`);
      expect(detail.status).toBe(200);
      expect(pick(detail.body, 'data.consulta.status')).toBe('completed');
      expect(pick(detail.body, 'data.consulta.paciente.nome')).toBe('Ana Souza');
      expect(pick(detail.body, 'data.consulta.medico')).toEqual({
        id: 1,
        username: 'drlima',
        email: 'lima@example.com',
      });

      const consultas = await call('GET', '/consultas?status=completed&data_inicio=2099-06-01&data_fim=2099-06-01');
      expect(pick(consultas.body, 'data.pagination.total')).toBe(1);
      expect(pick(consultas.body, 'data.consultas.0.paciente_nome')).toBe('Ana Souza');
    });

    it('soft deletes and reactivates a patient', async () => {
      const created = await call('POST', '/pacientes', { body: { nome: 'Bruno Lima', cpf: '98765432100' } });
      const id = String(pick(created.body, 'data.paciente.id'));

      const removed = await call('DELETE', `/pacientes/${id}`);
      expect(removed).toEqual({ status: 200, body: { success: true, message: 'Patient deactivated' } });

      expect((await call('GET', `/pacientes/${id}`)).status).toBe(404);

      const restored = await call('PUT', `/pacientes/${id}/reativar`);
      expect(restored.status).toBe(200);
      expect(pick(restored.body, 'data.paciente.ativo')).toBe(true);

      const again = await call('PUT', `/pacientes/${id}/reativar`);
      expect(again.status).toBe(400);
      expect(pick(again.body, 'error.code')).toBe('PATIENT_ALREADY_ACTIVE');
    });
  });
});
