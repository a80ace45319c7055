/**
 * Media pipeline — Object store
 *
 * Capability wrapper over an S3-compatible bucket (Backblaze B2 in
 * production). Under a versioned bucket a key can hold many historical
 * versions plus delete-markers; `listAllVersions` and `deleteObjectVersion`
 * exist so the purger can remove all of them.
 *
 * Every operation is independently retryable and fails with a
 * {@link StoreError}; callers that loop over many objects tally failures
 * instead of stopping at the first one.
 */

import { readFile } from "node:fs/promises";
import {
  S3Client,
  PutObjectCommand,
  ListObjectsV2Command,
  ListObjectVersionsCommand,
  DeleteObjectCommand,
  HeadObjectCommand,
  type ListObjectsV2CommandInput,
  type ListObjectVersionsCommandInput,
} from "@aws-sdk/client-s3";
import type { StorageConfig } from "../../config/media";
import { StoreError } from "./errors";
import type { ObjectVersion } from "./types";

const PAGE_SIZE = 1000;

export interface ObjectStore {
  /** Upload a local file, overwriting whatever is live at `key`. */
  put(localPath: string, key: string, contentType: string, cacheControl: string): Promise<void>;
  /** Every live key under `prefix`, across all pages. */
  listKeys(prefix: string): Promise<string[]>;
  /** Every version and delete-marker under `prefix`, across all pages. */
  listAllVersions(prefix: string): Promise<ObjectVersion[]>;
  /** Permanently remove one version or delete-marker. */
  deleteObjectVersion(key: string, versionId: string): Promise<void>;
  /**
   * Delete the live object at `key`. Under versioning this leaves a
   * delete-marker behind. Resolves `false` when nothing was live.
   */
  deleteCurrent(key: string): Promise<boolean>;
}

export function createS3Client(config: StorageConfig): S3Client {
  return new S3Client({
    region: config.region,
    endpoint: config.endpoint,
    credentials:
      config.accessKeyId && config.secretAccessKey
        ? { accessKeyId: config.accessKeyId, secretAccessKey: config.secretAccessKey }
        : undefined,
    forcePathStyle: config.forcePathStyle,
    // S3-compatible vendors reject the newer default CRC checksums
    requestChecksumCalculation: "WHEN_REQUIRED",
    responseChecksumValidation: "WHEN_REQUIRED",
  });
}

function isNotFound(err: unknown): boolean {
  if (typeof err !== "object" || err === null) return false;
  if ("name" in err && (err.name === "NotFound" || err.name === "NoSuchKey")) return true;
  if ("$metadata" in err) {
    const meta = err.$metadata;
    return typeof meta === "object" && meta !== null && "httpStatusCode" in meta && meta.httpStatusCode === 404;
  }
  return false;
}

export class S3ObjectStore implements ObjectStore {
  constructor(
    private readonly client: S3Client,
    private readonly bucket: string
  ) {}

  async put(localPath: string, key: string, contentType: string, cacheControl: string): Promise<void> {
    try {
      const body = await readFile(localPath);
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: body,
          ContentType: contentType,
          CacheControl: cacheControl,
        })
      );
    } catch (err) {
      throw new StoreError("put", key, { cause: err });
    }
  }

  async listKeys(prefix: string): Promise<string[]> {
    const keys: string[] = [];
    let token: string | undefined;
    try {
      do {
        const input: ListObjectsV2CommandInput = { Bucket: this.bucket, Prefix: prefix, MaxKeys: PAGE_SIZE };
        if (token) input.ContinuationToken = token;
        const page = await this.client.send(new ListObjectsV2Command(input));
        for (const obj of page.Contents ?? []) {
          if (obj.Key) keys.push(obj.Key);
        }
        token = page.IsTruncated ? page.NextContinuationToken : undefined;
      } while (token);
    } catch (err) {
      throw new StoreError("list", prefix, { cause: err });
    }
    return keys;
  }

  async listAllVersions(prefix: string): Promise<ObjectVersion[]> {
    const versions: ObjectVersion[] = [];
    let keyMarker: string | undefined;
    let versionIdMarker: string | undefined;
    try {
      for (;;) {
        const input: ListObjectVersionsCommandInput = { Bucket: this.bucket, Prefix: prefix, MaxKeys: PAGE_SIZE };
        if (keyMarker) input.KeyMarker = keyMarker;
        if (versionIdMarker) input.VersionIdMarker = versionIdMarker;
        const page = await this.client.send(new ListObjectVersionsCommand(input));

        for (const v of page.Versions ?? []) {
          if (v.Key && v.VersionId) versions.push({ key: v.Key, versionId: v.VersionId, isDeleteMarker: false });
        }
        for (const m of page.DeleteMarkers ?? []) {
          if (m.Key && m.VersionId) versions.push({ key: m.Key, versionId: m.VersionId, isDeleteMarker: true });
        }

        if (!page.IsTruncated) break;
        keyMarker = page.NextKeyMarker;
        versionIdMarker = page.NextVersionIdMarker;
        if (!keyMarker && !versionIdMarker) break;
      }
    } catch (err) {
      throw new StoreError("listVersions", prefix, { cause: err });
    }
    return versions;
  }

  async deleteObjectVersion(key: string, versionId: string): Promise<void> {
    try {
      await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: key, VersionId: versionId }));
    } catch (err) {
      throw new StoreError("deleteVersion", `${key}@${versionId}`, { cause: err });
    }
  }

  async deleteCurrent(key: string): Promise<boolean> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }));
    } catch (err) {
      if (isNotFound(err)) return false;
      throw new StoreError("head", key, { cause: err });
    }
    try {
      await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: key }));
    } catch (err) {
      throw new StoreError("delete", key, { cause: err });
    }
    return true;
  }
}
