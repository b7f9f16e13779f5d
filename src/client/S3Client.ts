import { AwsClient } from "aws4fetch";
import type {
  ObjectStoreClient,
  ObjectStoreResponse,
} from "./ObjectStoreClient.js";

/**
 * S3Client: ObjectStoreClient for S3-compatible stores (AWS S3, R2, MinIO),
 * signed with aws4fetch.
 */
export interface S3ClientOptions {
  endpoint: string;
  accessKeyId: string;
  secretAccessKey: string;
  region?: string;
  sessionToken?: string;
  /** Retries on 5xx and 429 responses; aws4fetch defaults to 10. */
  retries?: number;
}

type RequestOptions = {
  body?: Uint8Array;
  headers?: Record<string, string>;
};

/** Response for a request that never reached the store. */
function failure(error: string): ObjectStoreResponse {
  return { error, code: 0, body: new Uint8Array(), headers: {} };
}

export class S3Client implements ObjectStoreClient {
  private client: AwsClient;
  private endpoint: string;

  constructor(options: S3ClientOptions) {
    this.endpoint = options.endpoint.replace(/\/+$/, "");
    this.client = new AwsClient({
      accessKeyId: options.accessKeyId,
      secretAccessKey: options.secretAccessKey,
      sessionToken: options.sessionToken,
      service: "s3",
      region: options.region ?? "auto",
      retries: options.retries,
    });
  }

  /**
   * Path-style URL: <endpoint>/<bucket>/<key>
   */
  objectUrl(bucket: string, key: string): string {
    const encodedKey = key.split("/").map(encodeURIComponent).join("/");
    return `${this.endpoint}/${encodeURIComponent(bucket)}/${encodedKey}`;
  }

  getObject(bucket: string, key: string): Promise<ObjectStoreResponse> {
    return this.send("GET", bucket, key);
  }

  putObject(
    bucket: string,
    key: string,
    body: Uint8Array,
    headers: Record<string, string>
  ): Promise<ObjectStoreResponse> {
    return this.send("PUT", bucket, key, { body, headers });
  }

  deleteObject(bucket: string, key: string): Promise<ObjectStoreResponse> {
    return this.send("DELETE", bucket, key);
  }

  getObjectInfo(bucket: string, key: string): Promise<ObjectStoreResponse> {
    return this.send("HEAD", bucket, key);
  }

  private async send(
    method: string,
    bucket: string,
    key: string,
    options: RequestOptions = {}
  ): Promise<ObjectStoreResponse> {
    // URL parsing collapses "." and ".." (also when percent-encoded), which
    // would address another key or another bucket.
    if (key.split("/").some((segment) => segment === "." || segment === "..")) {
      return failure(`Unaddressable key: ${key}`);
    }

    try {
      const res = await this.client.fetch(this.objectUrl(bucket, key), {
        method,
        // copy into an ArrayBuffer-backed view, which is what fetch bodies take
        body: options.body ? new Uint8Array(options.body) : undefined,
        headers: options.headers,
      });

      const headers: Record<string, string> = {};
      res.headers.forEach((value, name) => {
        headers[name.toLowerCase()] = value;
      });
      const body =
        method === "HEAD" ? new Uint8Array() : new Uint8Array(await res.arrayBuffer());

      return {
        error: res.ok ? null : `HTTP ${res.status}`,
        code: res.status,
        body,
        headers,
      };
    } catch (err) {
      return failure(err instanceof Error ? err.message : String(err));
    }
  }
}
