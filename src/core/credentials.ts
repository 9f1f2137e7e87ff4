/**
 * Agent Credential Store
 * Agent symbol → bearer token, persisted as a JSON file
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { StorageError } from './errors.js';
import { TokenSet } from './types.js';

const TokenFileSchema = z.record(z.string());

export interface TokenLookup {
  get(symbol: string): string | undefined;
}

export class CredentialStore implements TokenLookup {
  private tokens: Map<string, string>;

  private constructor(
    readonly filePath: string,
    initial: TokenSet
  ) {
    this.tokens = new Map(Object.entries(initial));
  }

  /**
   * Read the token file. A missing file is an empty store; a file that
   * exists but cannot be read or parsed is an error, never an empty store.
   */
  static load(filePath: string): CredentialStore {
    if (!fs.existsSync(filePath)) {
      return new CredentialStore(filePath, {});
    }

    let raw: string;
    try {
      raw = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
      throw new StorageError(filePath, `Cannot read token file ${filePath}`, error);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new StorageError(filePath, `Token file ${filePath} is not valid JSON`, error);
    }

    const result = TokenFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new StorageError(
        filePath,
        `Token file ${filePath} must be an object of agent symbol to token strings`,
        result.error
      );
    }

    return new CredentialStore(filePath, result.data);
  }

  get(symbol: string): string | undefined {
    return this.tokens.get(symbol);
  }

  has(symbol: string): boolean {
    return this.tokens.has(symbol);
  }

  symbols(): string[] {
    return [...this.tokens.keys()];
  }

  snapshot(): TokenSet {
    return Object.fromEntries(this.tokens);
  }

  /**
   * Insert or overwrite a token and persist the whole set before returning.
   *
   * Runs synchronously start to finish, so no other read or store can
   * interleave. The file is written beside the target and renamed over it;
   * the in-memory set is swapped only once that succeeds.
   */
  store(symbol: string, token: string): void {
    const next = new Map(this.tokens);
    next.set(symbol, token);
    this.persist(next);
    this.tokens = next;
  }

  private persist(tokens: Map<string, string>): void {
    const dir = path.dirname(this.filePath);
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    const contents = JSON.stringify(Object.fromEntries(tokens), null, 2) + '\n';

    try {
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
      fs.writeFileSync(tmpPath, contents, { encoding: 'utf-8', mode: 0o600 });
      fs.renameSync(tmpPath, this.filePath);
    } catch (error) {
      if (fs.existsSync(tmpPath)) {
        fs.rmSync(tmpPath);
      }
      throw new StorageError(this.filePath, `Cannot write token file ${this.filePath}`, error);
    }
  }
}
