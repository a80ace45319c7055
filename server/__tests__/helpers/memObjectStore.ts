/**
 * In-memory versioned object store for pipeline tests.
 *
 * Behaves like a bucket with versioning enabled: a plain delete leaves a
 * delete-marker on top of the history, and only `deleteObjectVersion`
 * removes data for good. `failOn` lets a test make chosen calls throw a
 * {@link StoreError}.
 */

import { readFile } from "node:fs/promises";
import type { ObjectStore } from "../../services/media/objectStore";
import { StoreError, type StoreOperation } from "../../services/media/errors";
import type { ObjectVersion } from "../../services/media/types";

export interface StoredVersion {
  versionId: string;
  isDeleteMarker: boolean;
  body?: Buffer;
  contentType?: string;
  cacheControl?: string;
}

type FailurePredicate = (operation: StoreOperation, target: string) => boolean;

export class MemObjectStore implements ObjectStore {
  private readonly history = new Map<string, StoredVersion[]>();
  private nextVersion = 1;
  failOn: FailurePredicate = () => false;

  async put(localPath: string, key: string, contentType: string, cacheControl: string): Promise<void> {
    this.maybeFail("put", key);
    let body: Buffer;
    try {
      body = await readFile(localPath);
    } catch (err) {
      throw new StoreError("put", key, { cause: err });
    }
    this.append(key, { versionId: this.newVersionId(), isDeleteMarker: false, body, contentType, cacheControl });
  }

  async listKeys(prefix: string): Promise<string[]> {
    this.maybeFail("list", prefix);
    return this.sortedKeys(prefix).filter((key) => this.isLive(key));
  }

  async listAllVersions(prefix: string): Promise<ObjectVersion[]> {
    this.maybeFail("listVersions", prefix);
    const versions: ObjectVersion[] = [];
    for (const key of this.sortedKeys(prefix)) {
      for (const v of this.history.get(key) ?? []) {
        versions.push({ key, versionId: v.versionId, isDeleteMarker: v.isDeleteMarker });
      }
    }
    return versions;
  }

  async deleteObjectVersion(key: string, versionId: string): Promise<void> {
    this.maybeFail("deleteVersion", `${key}@${versionId}`);
    const remaining = (this.history.get(key) ?? []).filter((v) => v.versionId !== versionId);
    if (remaining.length > 0) {
      this.history.set(key, remaining);
    } else {
      this.history.delete(key);
    }
  }

  async deleteCurrent(key: string): Promise<boolean> {
    this.maybeFail("head", key);
    if (!this.isLive(key)) return false;
    this.maybeFail("delete", key);
    this.append(key, { versionId: this.newVersionId(), isDeleteMarker: true });
    return true;
  }

  /** Write a live object directly, bypassing the filesystem. */
  seed(key: string, body = "seed", contentType = "application/octet-stream"): void {
    this.append(key, {
      versionId: this.newVersionId(),
      isDeleteMarker: false,
      body: Buffer.from(body),
      contentType,
    });
  }

  /** Latest version of a live object, or undefined when absent or deleted. */
  current(key: string): StoredVersion | undefined {
    const versions = this.history.get(key);
    const latest = versions?.[versions.length - 1];
    return latest && !latest.isDeleteMarker ? latest : undefined;
  }

  liveKeys(prefix = ""): string[] {
    return this.sortedKeys(prefix).filter((key) => this.isLive(key));
  }

  private isLive(key: string): boolean {
    return this.current(key) !== undefined;
  }

  private sortedKeys(prefix: string): string[] {
    return Array.from(this.history.keys())
      .filter((key) => key.startsWith(prefix))
      .sort();
  }

  private append(key: string, version: StoredVersion): void {
    const versions = this.history.get(key) ?? [];
    versions.push(version);
    this.history.set(key, versions);
  }

  private newVersionId(): string {
    return `v${this.nextVersion++}`;
  }

  private maybeFail(operation: StoreOperation, target: string): void {
    if (this.failOn(operation, target)) {
      throw new StoreError(operation, target, { cause: new Error("injected failure") });
    }
  }
}
