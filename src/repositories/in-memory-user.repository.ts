import argon2 from 'argon2';
import { v4 as uuidv4 } from 'uuid';
import { User, CreateUserDTO, UpdateUserDTO } from '../models/user';
import { UserRepository } from './user.repository';

export class InMemoryUserRepository implements UserRepository {
  private users: User[] = [];

  async create(user: CreateUserDTO): Promise<User> {
    const passwordHash = await argon2.hash(user.password);
    const now = new Date();
    const newUser: User = {
      id: uuidv4(),
      username: user.username,
      email: user.email.toLowerCase(),
      password_hash: passwordHash,
      first_name: user.first_name ?? null,
      last_name: user.last_name ?? null,
      client_id: uuidv4(),
      roles: user.roles ?? ['user'],
      is_active: true,
      failed_login_attempts: 0,
      last_failed_login_at: null,
      last_login_at: null,
      created_at: now,
      updated_at: now,
    };
    this.users.push(newUser);
    return { ...newUser };
  }

  async findById(id: string): Promise<User | null> {
    const user = this.users.find(u => u.id === id);
    return user ? { ...user } : null;
  }

  async findByName(username: string): Promise<User | null> {
    const lower = username.toLowerCase();
    const user = this.users.find(u => u.username.toLowerCase() === lower);
    return user ? { ...user } : null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const lower = email.toLowerCase();
    const user = this.users.find(u => u.email === lower);
    return user ? { ...user } : null;
  }

  async checkPassword(user: User, password: string): Promise<boolean> {
    return argon2.verify(user.password_hash, password);
  }

  async update(id: string, user: UpdateUserDTO): Promise<User | null> {
    const index = this.users.findIndex(u => u.id === id);
    if (index === -1) return null;

    const updated: User = {
      ...this.users[index],
      ...user,
      updated_at: new Date(),
    };
    if (user.email !== undefined) {
      updated.email = user.email.toLowerCase();
    }
    this.users[index] = updated;
    return { ...updated };
  }

  async getRoles(user: User): Promise<string[]> {
    const stored = this.users.find(u => u.id === user.id);
    return stored ? [...stored.roles] : [];
  }
}
