import { utils } from 'ssh2';
import { HostKey, PublicKeyCredential } from '../keys.js';
import { ConsoleError, ErrorCode } from '../errors.js';

const SEED = Buffer.alloc(32, 7).toString('base64');

function errorCodeOf(fn: () => unknown): ErrorCode | undefined {
  try {
    fn();
  } catch (error) {
    return error instanceof ConsoleError ? error.code : undefined;
  }
  return undefined;
}

function parsePrivate(hostKey: HostKey) {
  const parsed = utils.parseKey(hostKey.toOpenSSH());
  if (parsed instanceof Error) {
    throw parsed;
  }
  return parsed;
}

describe('HostKey', () => {
  test('should round-trip its text form', () => {
    const text = `ed25519 ${SEED}`;
    expect(HostKey.fromString(text).toString()).toBe(text);
  });

  test('should round-trip a generated key', () => {
    const key = HostKey.generate();
    const copy = HostKey.fromString(key.toString());

    expect(copy.toString()).toBe(key.toString());
    expect(copy.publicKey()).toBe(key.publicKey());
  });

  test('should ignore surrounding whitespace and a trailing comment', () => {
    const key = HostKey.fromString(`  ed25519 ${SEED} my-host \n`);
    expect(key.toString()).toBe(`ed25519 ${SEED}`);
  });

  test('should reject unsupported algorithms', () => {
    expect(errorCodeOf(() => HostKey.fromString(`rsa ${SEED}`))).toBe(ErrorCode.UNSUPPORTED_KEY_ALGORITHM);
    expect(errorCodeOf(() => HostKey.fromString(`ED25519 ${SEED}`))).toBe(ErrorCode.UNSUPPORTED_KEY_ALGORITHM);
  });

  test('should reject missing or malformed payloads', () => {
    expect(errorCodeOf(() => HostKey.fromString(''))).toBe(ErrorCode.INVALID_HOST_KEY);
    expect(errorCodeOf(() => HostKey.fromString('ed25519'))).toBe(ErrorCode.INVALID_HOST_KEY);
    expect(errorCodeOf(() => HostKey.fromString('ed25519 not*base64!'))).toBe(ErrorCode.INVALID_HOST_KEY);
    expect(errorCodeOf(() => HostKey.fromString(`ed25519 ${SEED.slice(0, -1)}`))).toBe(ErrorCode.INVALID_HOST_KEY);
  });

  test('should reject payloads of the wrong length', () => {
    const short = Buffer.alloc(16, 1).toString('base64');
    expect(errorCodeOf(() => HostKey.fromString(`ed25519 ${short}`))).toBe(ErrorCode.INVALID_HOST_KEY);
  });

  test('should produce an OpenSSH private key that ssh2 loads', () => {
    const key = HostKey.generate();
    const parsed = parsePrivate(key);

    expect(parsed.type).toBe('ssh-ed25519');
    expect(parsed.isPrivateKey()).toBe(true);
    expect(parsed.getPublicSSH().equals(key.publicBlob())).toBe(true);
  });

  test('should format the public key as an authorized_keys line', () => {
    const key = HostKey.generate();
    const line = key.publicKey('alice@example');

    expect(line).toBe(`ssh-ed25519 ${key.publicBlob().toString('base64')} alice@example`);
  });
});

describe('PublicKeyCredential', () => {
  const key = HostKey.generate();
  const other = HostKey.generate();
  const credential = new PublicKeyCredential('ssh-ed25519', key.publicBlob());

  test('should match its own OpenSSH line', () => {
    expect(credential.matches(key.publicKey())).toBe(true);
    expect(credential.matches(key.publicKey('alice@example'))).toBe(true);
  });

  test('should not match a different key', () => {
    expect(credential.matches(other.publicKey())).toBe(false);
  });

  test('should not match malformed lines', () => {
    expect(credential.matches('')).toBe(false);
    expect(credential.matches('not a key')).toBe(false);
    expect(credential.matches('ssh-ed25519 !!!')).toBe(false);
  });

  test('should not match when the algorithm differs', () => {
    const mislabelled = new PublicKeyCredential('ecdsa-sha2-nistp256', key.publicBlob());
    expect(mislabelled.matches(key.publicKey())).toBe(false);
  });

  test('should find a matching line among blank and padded lines', () => {
    const file = `\n\n  ${other.publicKey()}\n   ${key.publicKey('alice@example')}   \n\n`;
    expect(credential.isAuthorized(file)).toBe(true);
  });

  test('should reject files without a matching line', () => {
    expect(credential.isAuthorized(`${other.publicKey()}\nnot a key\n`)).toBe(false);
    expect(credential.isAuthorized('')).toBe(false);
  });

  test('should verify signatures made with the private half', () => {
    const data = Buffer.from('session data');
    const signature = parsePrivate(key).sign(data);
    if (signature instanceof Error) {
      throw signature;
    }

    expect(credential.verify({ blob: data, signature })).toBe(true);
    expect(credential.verify({ blob: Buffer.from('other data'), signature })).toBe(false);
  });
});
