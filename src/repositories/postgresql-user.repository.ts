import argon2 from 'argon2';
import { v4 as uuidv4 } from 'uuid';
import { DatabaseAdapter } from '../database/adapter';
import { User, CreateUserDTO, UpdateUserDTO } from '../models/user';
import { UserRepository } from './user.repository';

export class PostgreSQLUserRepository implements UserRepository {
  constructor(private db: DatabaseAdapter) {}

  async create(user: CreateUserDTO): Promise<User> {
    const passwordHash = await argon2.hash(user.password);

    const query = `
      INSERT INTO users (
        id, username, email, password_hash, first_name, last_name, client_id, roles,
        is_active, created_at, updated_at
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, true, NOW(), NOW())
      RETURNING *
    `;
    const result = await this.db.query<User>(query, [
      uuidv4(),
      user.username,
      user.email.toLowerCase(),
      passwordHash,
      user.first_name ?? null,
      user.last_name ?? null,
      uuidv4(),
      user.roles ?? ['user'],
    ]);
    return result.rows[0];
  }

  async findById(id: string): Promise<User | null> {
    const result = await this.db.query<User>('SELECT * FROM users WHERE id = $1', [id]);
    return result.rows[0] || null;
  }

  async findByName(username: string): Promise<User | null> {
    const result = await this.db.query<User>('SELECT * FROM users WHERE LOWER(username) = LOWER($1)', [username]);
    return result.rows[0] || null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const result = await this.db.query<User>('SELECT * FROM users WHERE email = LOWER($1)', [email]);
    return result.rows[0] || null;
  }

  async checkPassword(user: User, password: string): Promise<boolean> {
    return argon2.verify(user.password_hash, password);
  }

  async update(id: string, user: UpdateUserDTO): Promise<User | null> {
    const updates: string[] = [];
    const values: unknown[] = [];
    let paramIndex = 1;

    const set = (column: string, value: unknown) => {
      updates.push(`${column} = $${paramIndex++}`);
      values.push(value);
    };

    if (user.email !== undefined) set('email', user.email.toLowerCase());
    if (user.first_name !== undefined) set('first_name', user.first_name);
    if (user.last_name !== undefined) set('last_name', user.last_name);
    if (user.is_active !== undefined) set('is_active', user.is_active);
    if (user.roles !== undefined) set('roles', user.roles);
    if (user.failed_login_attempts !== undefined) set('failed_login_attempts', user.failed_login_attempts);
    if (user.last_failed_login_at !== undefined) set('last_failed_login_at', user.last_failed_login_at);
    if (user.last_login_at !== undefined) set('last_login_at', user.last_login_at);

    if (updates.length === 0) {
      return this.findById(id);
    }

    updates.push('updated_at = NOW()');
    values.push(id);

    const query = `
      UPDATE users
      SET ${updates.join(', ')}
      WHERE id = $${paramIndex}
      RETURNING *
    `;
    const result = await this.db.query<User>(query, values);
    return result.rows[0] || null;
  }

  async getRoles(user: User): Promise<string[]> {
    const result = await this.db.query<{ roles: string[] }>('SELECT roles FROM users WHERE id = $1', [user.id]);
    return result.rows[0]?.roles ?? [];
  }
}
