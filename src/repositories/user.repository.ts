import { User, CreateUserDTO, UpdateUserDTO } from '../models/user';

export interface UserRepository {
  create(user: CreateUserDTO): Promise<User>;
  findById(id: string): Promise<User | null>;
  /** Case-insensitive username lookup */
  findByName(username: string): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  checkPassword(user: User, password: string): Promise<boolean>;
  update(id: string, user: UpdateUserDTO): Promise<User | null>;
  getRoles(user: User): Promise<string[]>;
}
