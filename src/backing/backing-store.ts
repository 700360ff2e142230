// ── Backing store ────────────────────────────────────────────────
//
// Object-level access to the reserved account that holds identity
// data. Every method is scoped to that one account; container and
// object names are passed unencoded.

export type ObjectMetadata = Readonly<Record<string, string>>;

export interface StoredObject {
  readonly body: string;
  readonly metadata: ObjectMetadata;
}

export interface ContainerInfo {
  readonly metadata: ObjectMetadata;
  readonly objectCount: number;
}

export interface PutObjectOptions {
  /** Create only: resolve `false` instead of overwriting an existing object. */
  readonly ifNoneMatch?: boolean;
  /** Replaces the object's metadata. */
  readonly metadata?: ObjectMetadata;
}

export interface BackingStore {
  /** Name of the reserved account this store reads and writes. */
  readonly accountName: string;

  /** Creates the reserved account itself. Idempotent. */
  createAccount(): Promise<void>;

  /** `null` when the object (or its container) does not exist. */
  getObject(container: string, name: string): Promise<StoredObject | null>;

  /**
   * Writes an object. Resolves `false` only for a conditional write
   * that found an existing object. Throws NOT_FOUND when the
   * container is missing.
   */
  putObject(
    container: string,
    name: string,
    body: string,
    options?: PutObjectOptions,
  ): Promise<boolean>;

  /** Replaces an object's metadata. `false` when the object is missing. */
  postObjectMetadata(container: string, name: string, metadata: ObjectMetadata): Promise<boolean>;

  /** `false` when the object was already gone. */
  deleteObject(container: string, name: string): Promise<boolean>;

  /** Object names in lexical order, or `null` when the container is missing. */
  listObjects(container: string): Promise<string[] | null>;

  /** Creates a container, merging metadata into an existing one. */
  createContainer(container: string, metadata?: ObjectMetadata): Promise<void>;

  headContainer(container: string): Promise<ContainerInfo | null>;

  /** Merges container metadata. `false` when the container is missing. */
  postContainerMetadata(container: string, metadata: ObjectMetadata): Promise<boolean>;

  /** Throws CONFLICT when the container still holds objects. */
  deleteContainer(container: string): Promise<boolean>;

  /** Container names in lexical order. */
  listContainers(): Promise<string[]>;
}
