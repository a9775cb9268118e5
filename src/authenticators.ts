import { promises as fs } from 'fs';
import { homedir } from 'os';
import { createHash, timingSafeEqual } from 'crypto';
import { createLogger } from './logger.js';
import type { PasswordAuthenticator, PublicKeyAuthenticator } from './types.js';

const logger = createLogger('Authenticators');

function expandHome(path: string): string {
  return path.startsWith('~/') ? `${homedir()}${path.slice(1)}` : path;
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

/**
 * Accepts any key listed in an OpenSSH `authorized_keys` file. The file is
 * read on every attempt, so edits apply without a restart. The username is
 * not consulted.
 */
export function authorizedKeysAuthenticator(path: string): PublicKeyAuthenticator {
  const filePath = expandHome(path);

  return async (username, credential) => {
    let contents: string;
    try {
      contents = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        logger.warn(`Authorized keys file not found: ${filePath}`);
      } else {
        logger.error(`Failed to read authorized keys file ${filePath}:`, error);
      }
      return false;
    }

    const authorized = credential.isAuthorized(contents);
    logger.debug(`Key ${credential.algorithm} for ${username}: ${authorized ? 'authorized' : 'not authorized'}`);
    return authorized;
  };
}

/**
 * A single fixed username and password, compared in constant time.
 */
export function staticPasswordAuthenticator(username: string, password: string): PasswordAuthenticator {
  const expectedUser = digest(username);
  const expectedPassword = digest(password);

  return (candidateUser, candidatePassword) => {
    const userMatches = timingSafeEqual(digest(candidateUser), expectedUser);
    const passwordMatches = timingSafeEqual(digest(candidatePassword), expectedPassword);
    return userMatches && passwordMatches;
  };
}
