import crypto from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { errorMessage, isNodeError } from "../utils/error";
import { sha256Hex } from "../utils/hash";
import { type Logger, silentLogger } from "../utils/logger";
import type { Cache, CacheEntry } from "./types";

export interface FileCacheOptions {
  dir: string;
  logger?: Logger;
}

/** Only the envelope is checked; callers validate the value with their own schema. */
function isCacheEntry(parsed: unknown): parsed is CacheEntry<unknown> {
  if (!parsed || typeof parsed !== "object") return false;
  return (
    "expiresAt" in parsed &&
    typeof parsed.expiresAt === "number" &&
    "storedAt" in parsed &&
    typeof parsed.storedAt === "number" &&
    "value" in parsed
  );
}

/**
 * Provider responses as JSON files under `dir/<2 hex>/<sha256>.json`.
 * Values come back untyped, hence `Cache<unknown>`.
 */
export class FileCache implements Cache<unknown> {
  private readonly dir: string;
  private readonly logger: Logger;

  constructor(opts: FileCacheOptions) {
    this.dir = opts.dir;
    this.logger = opts.logger ?? silentLogger;
  }

  private pathFor(key: string): string {
    const h = sha256Hex(key);
    return path.join(this.dir, h.slice(0, 2), `${h}.json`);
  }

  private async isSymlink(p: string): Promise<boolean> {
    try {
      return (await fs.lstat(p)).isSymbolicLink();
    } catch {
      return false;
    }
  }

  private async remove(file: string): Promise<boolean> {
    try {
      await fs.unlink(file);
      return true;
    } catch (e) {
      if (isNodeError(e) && e.code === "ENOENT") return true;
      this.logger.debug(`cache: cannot delete ${file}: ${errorMessage(e)}`);
      return false;
    }
  }

  async get(key: string): Promise<CacheEntry<unknown> | null> {
    const file = this.pathFor(key);
    if (await this.isSymlink(file)) {
      this.logger.warn(`cache: ignoring symlink at ${file}`);
      return null;
    }
    let raw: string;
    try {
      raw = await fs.readFile(file, "utf-8");
    } catch (e) {
      if (!isNodeError(e) || e.code !== "ENOENT") this.logger.warn(`cache: read failed for ${file}: ${errorMessage(e)}`);
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      parsed = undefined;
    }
    if (!isCacheEntry(parsed)) {
      this.logger.debug(`cache: dropping corrupt entry ${file}`);
      await this.remove(file);
      return null;
    }
    return parsed.expiresAt > Date.now() ? parsed : null;
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    if (!Number.isFinite(ttlSeconds) || ttlSeconds <= 0) throw new Error(`Invalid TTL: ${ttlSeconds}`);
    const file = this.pathFor(key);
    const dir = path.dirname(file);
    if (await this.isSymlink(dir)) throw new Error(`Symlink detected at cache directory: ${dir}`);
    await fs.mkdir(dir, { recursive: true, mode: 0o700 });

    const now = Date.now();
    const entry: CacheEntry<unknown> = { value, storedAt: now, expiresAt: now + ttlSeconds * 1000 };
    // Write then rename so readers never see a partial file
    const tmp = `${file}.${process.pid}.${crypto.randomBytes(8).toString("hex")}.tmp`;
    try {
      await fs.writeFile(tmp, JSON.stringify(entry), { encoding: "utf-8", mode: 0o600 });
      await fs.rename(tmp, file);
    } catch (e) {
      await this.remove(tmp);
      throw e;
    }
  }

  /** Delete expired and unreadable entries. */
  async prune(): Promise<{ pruned: number; failed: number }> {
    let pruned = 0;
    let failed = 0;
    let buckets: string[];
    try {
      buckets = await fs.readdir(this.dir);
    } catch (e) {
      if (isNodeError(e) && e.code === "ENOENT") return { pruned, failed };
      throw e;
    }

    for (const bucket of buckets) {
      const bucketPath = path.join(this.dir, bucket);
      const stat = await fs.lstat(bucketPath);
      if (!stat.isDirectory()) continue;

      for (const name of await fs.readdir(bucketPath)) {
        if (!name.endsWith(".json")) continue;
        const file = path.join(bucketPath, name);
        let expired = true;
        try {
          const parsed: unknown = JSON.parse(await fs.readFile(file, "utf-8"));
          expired = !isCacheEntry(parsed) || parsed.expiresAt <= Date.now();
        } catch (e) {
          this.logger.debug(`cache: unreadable entry ${file}: ${errorMessage(e)}`);
        }
        if (!expired) continue;
        if (await this.remove(file)) pruned++;
        else failed++;
      }
    }
    return { pruned, failed };
  }
}
