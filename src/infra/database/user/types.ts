import type { Generated } from 'kysely';

// Users Table
// `id` is INTEGER PRIMARY KEY AUTOINCREMENT, so SQLite never hands out an id twice.
export interface Users {
  id: Generated<number>;
  username: string;
  password_hash: string;
  role: string;
  email: string;
  created_at: string;
}

// Database Schema Interface
export interface UserDatabase {
  users: Users;
}
