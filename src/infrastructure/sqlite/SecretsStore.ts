import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { CredentialState } from '../../domain/entities/Credentials.js';
import type { SecretsPort } from '../../domain/ports/StoragePort.js';

const secretRows = z.array(z.object({ key: z.string(), value: z.string() }));

/** refresh/access token 與到期時間（epoch 毫秒）的持久化 */
export class SecretsStore implements SecretsPort {
  constructor(private readonly db: Database.Database) {}

  getCredentials(): CredentialState | undefined {
    const parsed = secretRows.safeParse(this.db.prepare('SELECT key, value FROM secrets').all());
    if (!parsed.success) return undefined;

    const values = new Map(parsed.data.map((row) => [row.key, row.value]));
    const refreshToken = values.get('refresh_token');
    const accessToken = values.get('access_token');
    const expiry = Number(values.get('access_token_expiry'));
    if (!refreshToken || !accessToken || !Number.isFinite(expiry)) return undefined;
    return { refreshToken, accessToken, accessTokenExpiry: expiry };
  }

  saveCredentials(state: CredentialState): void {
    const upsert = this.db.prepare('INSERT OR REPLACE INTO secrets(key, value) VALUES(?, ?)');
    this.db.transaction(() => {
      upsert.run('refresh_token', state.refreshToken);
      upsert.run('access_token', state.accessToken);
      upsert.run('access_token_expiry', String(state.accessTokenExpiry));
    })();
  }

  clear(): void {
    this.db.prepare('DELETE FROM secrets').run();
  }
}
