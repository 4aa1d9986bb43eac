/**
 * Account roles.
 *
 * Every account carries one of these tags. The tag travels inside the JWT
 * but no route checks it yet.
 */
export type UserRole = 'doctor' | 'admin' | 'receptionist';

export const USER_ROLES: readonly UserRole[] = ['doctor', 'admin', 'receptionist'];

/**
 * Account row as stored in the `users` table.
 * Note: password_hash, not password! Plain passwords are never stored.
 */
export interface User {
  id: number;
  username: string;
  password_hash: string;
  email: string | null;
  tipo_usuario: UserRole;
  ativo: boolean;
  data_cadastro: Date;
  data_atualizacao: Date;
}

/**
 * What we send to clients (NO password hash!)
 */
export interface UserPublic {
  id: number;
  username: string;
  email: string | null;
  tipo_usuario: UserRole;
  ativo: boolean;
  data_cadastro: Date;
}

export interface NewUser {
  username: string;
  password_hash: string;
  email: string | null;
  tipo_usuario: UserRole;
}

/**
 * Claims encoded in the bearer token
 */
export interface TokenClaims {
  userId: number;
  username: string;
  role: UserRole;
}

/**
 * What we return after a successful login
 */
export interface AuthResponse {
  user: UserPublic;
  token: string;
  expiresAt: Date | null;
}
