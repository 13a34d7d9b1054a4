import { query } from '../../shared/db';

export interface User {
  id: string;
  name: string;
  email: string | null;
  isAdmin: boolean;
  createdAt: Date;
  updatedAt: Date;
}

interface UserRow {
  id: string;
  name: string;
  email: string | null;
  is_admin: boolean;
  created_at: Date;
  updated_at: Date;
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    isAdmin: row.is_admin,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export async function findByName(name: string): Promise<User | null> {
  const result = await query<UserRow>(
    `SELECT id, name, email, is_admin, created_at, updated_at
     FROM users WHERE name = $1`,
    [name],
  );
  return result.rows[0] ? toUser(result.rows[0]) : null;
}
