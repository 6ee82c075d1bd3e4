/**
 * Password hashing
 */

import bcrypt from 'bcrypt';
import { config } from '../config/index.js';

export function hashPassword(password: string): Promise<string> {
  return bcrypt.hash(password, config.bcryptRounds);
}

export function verifyPassword(password: string, hash: string): Promise<boolean> {
  return bcrypt.compare(password, hash);
}
