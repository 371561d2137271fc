/**
 * Directory of JSON files, one per service, readable only by the owner.
 *
 * Layout:
 * - Directory: 0700 (owner rwx only)
 * - Files: 0600 (owner rw only)
 *
 * @module storage/json-store
 */

import {
  chmodSync,
  mkdirSync,
  readFileSync,
  unlinkSync,
  writeFileSync,
} from "node:fs";
import { join } from "node:path";
import type { z } from "zod";
import { errnoCode, SecretStoreError, SecretStoreUnavailableError } from "./errors.js";

/**
 * Sanitizes a service id for use as a filename.
 * Replaces unsafe characters with underscores.
 */
export function sanitizeServiceId(id: string): string {
  return id.replace(/[^a-zA-Z0-9_-]/g, "_");
}

export class JsonFileStore<T> {
  constructor(
    readonly baseDir: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    private readonly label: string,
  ) {}

  filePath(id: string): string {
    return join(this.baseDir, `${sanitizeServiceId(id)}.json`);
  }

  /**
   * @returns Parsed entry, or undefined if none is stored
   * @throws SecretStoreUnavailableError if the file cannot be read
   * @throws SecretStoreError if the file is not a valid entry
   */
  read(id: string): T | undefined {
    const filePath = this.filePath(id);

    let content: string;
    try {
      content = readFileSync(filePath, "utf-8");
    } catch (err) {
      if (errnoCode(err) === "ENOENT") {
        return undefined;
      }
      throw new SecretStoreUnavailableError(filePath, err);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (err) {
      throw new SecretStoreError(`Stored ${this.label} for ${id} is not valid JSON`, err);
    }

    const result = this.schema.safeParse(raw);
    if (!result.success) {
      throw new SecretStoreError(
        `Stored ${this.label} for ${id} is malformed: ${result.error.issues
          .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
          .join("; ")}`,
      );
    }
    return result.data;
  }

  /**
   * @throws SecretStoreUnavailableError if the file cannot be written
   */
  write(id: string, value: T): void {
    const filePath = this.filePath(id);
    try {
      mkdirSync(this.baseDir, { recursive: true, mode: 0o700 });
      chmodSync(this.baseDir, 0o700);
      writeFileSync(filePath, `${JSON.stringify(value, null, 2)}\n`, {
        mode: 0o600,
      });
      // mode only applies when the file is created
      chmodSync(filePath, 0o600);
    } catch (err) {
      throw new SecretStoreUnavailableError(filePath, err);
    }
  }

  /**
   * Removes the entry. A missing entry is not an error.
   *
   * @returns true if a file was removed
   * @throws SecretStoreUnavailableError if the file cannot be removed
   */
  remove(id: string): boolean {
    const filePath = this.filePath(id);
    try {
      unlinkSync(filePath);
      return true;
    } catch (err) {
      if (errnoCode(err) === "ENOENT") {
        return false;
      }
      throw new SecretStoreUnavailableError(filePath, err);
    }
  }
}
