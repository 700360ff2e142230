import { ErrorCode, StorewardError } from '../errors.js';
import { isSuccess, unexpectedStatus, type ObjectStorageClient } from './object-storage-client.js';

/** Creates and removes storage accounts on the cluster, keyed by account id. */
export interface AccountProvisioner {
  createAccount(accountId: string): Promise<void>;
  deleteAccount(accountId: string): Promise<void>;
}

export const NOOP_ACCOUNT_PROVISIONER: AccountProvisioner = {
  createAccount: () => Promise.resolve(),
  deleteAccount: () => Promise.resolve(),
};

// ── HttpAccountProvisioner ───────────────────────────────────────

export class HttpAccountProvisioner implements AccountProvisioner {
  readonly #client: ObjectStorageClient;

  constructor(client: ObjectStorageClient) {
    this.#client = client;
  }

  async createAccount(accountId: string): Promise<void> {
    const res = await this.#client.request('PUT', [accountId]);
    if (!isSuccess(res.status)) {
      throw unexpectedStatus('PUT', accountId, res.status);
    }
  }

  async deleteAccount(accountId: string): Promise<void> {
    const res = await this.#client.request('DELETE', [accountId]);
    if (res.status === 404) return;
    if (res.status === 409) {
      throw new StorewardError(
        ErrorCode.CONFLICT,
        `Storage account "${accountId}" still holds containers`,
      );
    }
    if (!isSuccess(res.status)) {
      throw unexpectedStatus('DELETE', accountId, res.status);
    }
  }
}
