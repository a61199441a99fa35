/**
 * Credential Vault
 *
 * Holds SSH key material for repositories behind opaque references.
 * Persisted keys live in `<root>/<ref>/` (dir 0700, files 0600). Git never
 * sees those files directly: every operation materializes its own ephemeral
 * copy under `<root>/.ephemeral/` and deletes it when the operation settles.
 */

import path from 'path';
import crypto from 'crypto';
import {
  CredentialNotFoundError,
  CredentialWriteError,
  ValidationError,
  errorMessage,
} from '../errors.js';
import { logWarn } from '../fault-logger.js';
import { NodeSecretFileProvider, type SecretFileProvider } from './secret-file-provider.js';

const DIR_MODE = 0o700;
const FILE_MODE = 0o600;
const EPHEMERAL_DIR = '.ephemeral';
const PRIVATE_KEY_FILE = 'id_key';
const PUBLIC_KEY_FILE = 'id_key.pub';
const OWNER_FILE = 'owner';
const REF_PATTERN = /^cred_[0-9a-f]{24}$/;

/** A per-operation key file. Call dispose() exactly when the operation ends. */
export interface EphemeralKey {
  path: string;
  dispose(): Promise<void>;
}

/**
 * Normalize PEM/OpenSSH armored key text: trim every line, drop blank lines,
 * end with a single newline. Throws ValidationError if the armor is missing.
 */
export function normalizePrivateKey(key: string): string {
  const lines = key
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  const first = lines[0] ?? '';
  const last = lines[lines.length - 1] ?? '';
  if (
    lines.length < 2 ||
    !first.startsWith('-----BEGIN') ||
    !first.endsWith('-----') ||
    !last.startsWith('-----END') ||
    !last.endsWith('-----')
  ) {
    throw new ValidationError('Private key must be an armored key (-----BEGIN ... -----END ...-----)');
  }

  return lines.join('\n') + '\n';
}

export class CredentialVault {
  constructor(
    private readonly root: string,
    private readonly files: SecretFileProvider = new NodeSecretFileProvider()
  ) {}

  /**
   * Persist a key pair and return its reference.
   * `owner` is recorded beside the material for operators.
   */
  async store(owner: number | string, privateKey: string, publicKey?: string): Promise<string> {
    const normalized = normalizePrivateKey(privateKey);
    const ref = `cred_${crypto.randomBytes(12).toString('hex')}`;
    const dir = this.refDir(ref);

    try {
      await this.files.ensureDir(this.root, DIR_MODE);
      await this.files.ensureDir(dir, DIR_MODE);
      await this.files.writeFile(path.join(dir, PRIVATE_KEY_FILE), normalized, FILE_MODE);
      if (publicKey && publicKey.trim()) {
        await this.files.writeFile(path.join(dir, PUBLIC_KEY_FILE), publicKey.trim() + '\n', FILE_MODE);
      }
      await this.files.writeFile(path.join(dir, OWNER_FILE), String(owner), FILE_MODE);
    } catch (err) {
      await this.files.remove(dir).catch(() => undefined);
      throw new CredentialWriteError(`Cannot store credential: ${errorMessage(err)}`, { owner });
    }

    return ref;
  }

  async has(ref: string): Promise<boolean> {
    return REF_PATTERN.test(ref) && this.files.exists(path.join(this.refDir(ref), PRIVATE_KEY_FILE));
  }

  async getPublicKey(ref: string): Promise<string | null> {
    await this.assertKnown(ref);
    const pubPath = path.join(this.refDir(ref), PUBLIC_KEY_FILE);
    if (!(await this.files.exists(pubPath))) return null;
    return (await this.files.readFile(pubPath)).trim();
  }

  /**
   * Write a fresh 0600 copy of the private key for one operation.
   * Each call gets its own file, so concurrent operations never share one.
   */
  async materialize(ref: string): Promise<EphemeralKey> {
    await this.assertKnown(ref);

    const content = await this.files.readFile(path.join(this.refDir(ref), PRIVATE_KEY_FILE));
    const ephemeralDir = path.join(this.root, EPHEMERAL_DIR);
    const keyPath = path.join(ephemeralDir, `${ref}-${crypto.randomBytes(6).toString('hex')}`);

    try {
      await this.files.ensureDir(this.root, DIR_MODE);
      await this.files.ensureDir(ephemeralDir, DIR_MODE);
      await this.files.writeFile(keyPath, content, FILE_MODE);
    } catch (err) {
      await this.files.remove(keyPath).catch(() => undefined);
      throw new CredentialWriteError(`Cannot materialize credential: ${errorMessage(err)}`, { ref });
    }

    let disposed = false;
    return {
      path: keyPath,
      dispose: async () => {
        if (disposed) return;
        disposed = true;
        await this.files.remove(keyPath);
      },
    };
  }

  /**
   * Run `fn` with a materialized key path. The file is deleted when `fn`
   * settles, whether it resolves or rejects.
   */
  async withKey<T>(ref: string, fn: (keyPath: string) => Promise<T>): Promise<T> {
    const key = await this.materialize(ref);
    try {
      return await fn(key.path);
    } finally {
      await key.dispose();
    }
  }

  /** Remove all persisted material for `ref`. Unknown refs are ignored. */
  async revoke(ref: string): Promise<void> {
    if (!REF_PATTERN.test(ref)) return;
    await this.files.remove(this.refDir(ref));
  }

  /**
   * Delete ephemeral copies left behind by a process that died mid-operation.
   * Call once at startup, before any sync runs.
   */
  async sweepEphemeral(): Promise<number> {
    const ephemeralDir = path.join(this.root, EPHEMERAL_DIR);
    const leftovers = await this.files.list(ephemeralDir);
    for (const name of leftovers) {
      await this.files.remove(path.join(ephemeralDir, name));
    }
    if (leftovers.length > 0) {
      logWarn('vault', `Removed ${leftovers.length} stale ephemeral key file(s)`);
    }
    return leftovers.length;
  }

  private refDir(ref: string): string {
    return path.join(this.root, ref);
  }

  private async assertKnown(ref: string): Promise<void> {
    if (!(await this.has(ref))) {
      throw new CredentialNotFoundError(ref);
    }
  }
}
