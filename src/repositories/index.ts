import { getDatabase } from '../database';
import { getEnv } from '../config/env';
import { UserRepository } from './user.repository';
import { InMemoryUserRepository } from './in-memory-user.repository';
import { PostgreSQLUserRepository } from './postgresql-user.repository';
import { RefreshTokenRepository } from './refresh-token.repository';
import { InMemoryRefreshTokenRepository } from './in-memory-refresh-token.repository';
import { PostgreSQLRefreshTokenRepository } from './postgresql-refresh-token.repository';

let userRepository: UserRepository | null = null;
let refreshTokenRepository: RefreshTokenRepository | null = null;

export function getUserRepository(): UserRepository {
  if (!userRepository) {
    if (getEnv().DB_TYPE === 'postgres') {
      userRepository = new PostgreSQLUserRepository(getDatabase());
    } else {
      userRepository = new InMemoryUserRepository();
    }
  }
  return userRepository;
}

export function getRefreshTokenRepository(): RefreshTokenRepository {
  if (!refreshTokenRepository) {
    if (getEnv().DB_TYPE === 'postgres') {
      refreshTokenRepository = new PostgreSQLRefreshTokenRepository(getDatabase());
    } else {
      refreshTokenRepository = new InMemoryRefreshTokenRepository();
    }
  }
  return refreshTokenRepository;
}
