/**
 * User (account) Model
 *
 * Models are the ONLY place we write SQL. Every function takes the
 * request's transaction handle as its first argument.
 */

import { query, Queryable } from './db';
import { NewUser, User } from '../types';

const USER_COLUMNS = `
  id, username, password_hash, email, tipo_usuario, ativo, data_cadastro, data_atualizacao
`;

export async function createUser(db: Queryable, data: NewUser): Promise<User> {
  const sql = `
    INSERT INTO users (username, password_hash, email, tipo_usuario)
    VALUES ($1, $2, $3, $4)
    RETURNING ${USER_COLUMNS}
  `;
  const result = await query<User>(db, sql, [data.username, data.password_hash, data.email, data.tipo_usuario]);
  return result.rows[0];
}

/**
 * Find user by username, active or not (includes password_hash)
 */
export async function findUserByUsername(db: Queryable, username: string): Promise<User | null> {
  const result = await query<User>(db, `SELECT ${USER_COLUMNS} FROM users WHERE username = $1`, [username]);
  return result.rows[0] || null;
}

export async function findUserByEmail(db: Queryable, email: string): Promise<User | null> {
  const result = await query<User>(db, `SELECT ${USER_COLUMNS} FROM users WHERE email = $1`, [email]);
  return result.rows[0] || null;
}

export async function findUserById(db: Queryable, id: number): Promise<User | null> {
  const result = await query<User>(db, `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [id]);
  return result.rows[0] || null;
}

export async function updateUserPassword(db: Queryable, id: number, passwordHash: string): Promise<void> {
  const sql = `
    UPDATE users
    SET password_hash = $2, data_atualizacao = NOW()
    WHERE id = $1
  `;
  await query(db, sql, [id, passwordHash]);
}
