/**
 * Outcome of one object store request. Clients report failures here instead of throwing.
 */
export interface ObjectStoreResponse {
  /** `null` on success, otherwise a short description of the failure. */
  error: string | null;
  /** HTTP status, or 0 when no response arrived. */
  code: number;
  body: Uint8Array;
  /** Response headers, names lower-cased. */
  headers: Record<string, string>;
}

/**
 * ObjectStoreClient: the remote store operations the S3 adapter relies on.
 *
 * Signing, transport and retries are the client's business.
 */
export interface ObjectStoreClient {
  getObject(bucket: string, key: string): Promise<ObjectStoreResponse>;

  putObject(
    bucket: string,
    key: string,
    body: Uint8Array,
    headers: Record<string, string>
  ): Promise<ObjectStoreResponse>;

  deleteObject(bucket: string, key: string): Promise<ObjectStoreResponse>;

  /**
   * Metadata probe (HEAD): status and headers without the body.
   */
  getObjectInfo(bucket: string, key: string): Promise<ObjectStoreResponse>;
}
