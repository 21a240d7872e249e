import { Result } from '../../types/result.types';

/**
 * Object store primitives keyed by (container, key). A container is a bucket
 * for remote stores and a directory for the local store.
 */
export interface IObjectStorage {
  upload(container: string, key: string, body: string | Buffer, contentType?: string): Promise<Result<void>>;

  /** @returns success without data when the key does not exist */
  download(container: string, key: string): Promise<Result<Buffer>>;

  list(container: string, prefix?: string): Promise<Result<string[]>>;

  /** Creates the container if it does not exist yet. */
  createContainer(container: string): Promise<Result<void>>;
}
