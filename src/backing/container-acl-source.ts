import { isSuccess, unexpectedStatus, type ObjectStorageClient } from './object-storage-client.js';

export interface ContainerAcl {
  readonly read: string | null;
  readonly write: string | null;
}

/** Looks up the read/write ACL strings a container carries. */
export interface ContainerAclSource {
  /** `null` when the container does not exist. */
  getContainerAcl(account: string, container: string): Promise<ContainerAcl | null>;
}

// ── HttpContainerAclSource ───────────────────────────────────────

export class HttpContainerAclSource implements ContainerAclSource {
  readonly #client: ObjectStorageClient;

  constructor(client: ObjectStorageClient) {
    this.#client = client;
  }

  async getContainerAcl(account: string, container: string): Promise<ContainerAcl | null> {
    const res = await this.#client.request('HEAD', [account, container]);
    if (res.status === 404) return null;
    if (!isSuccess(res.status)) {
      throw unexpectedStatus('HEAD', `${account}/${container}`, res.status);
    }
    return {
      read: res.headers.get('x-container-read'),
      write: res.headers.get('x-container-write'),
    };
  }
}
