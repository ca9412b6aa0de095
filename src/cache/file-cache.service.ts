import { Injectable } from "@nestjs/common";
import { promises as fs } from "fs";
import * as path from "path";
import { v4 as uuidv4 } from "uuid";
import { StandardService } from "@/common/base/composed.service";
import { isDataType, type DataType, type DateKey, type PartialReading } from "@/common/types/core";
import type { CacheEntry, CachePayload, CacheStats, CacheStore } from "@/common/types/cache";
import type { PipelineConfig } from "@/common/types/config";
import { ErrorCode } from "@/common/types/error-handling";
import { errorMessage, isNodeErrorWithCode, toError } from "@/common/utils/error.utils";
import { ConfigService } from "@/config/config.service";

const MS_PER_HOUR = 60 * 60 * 1000;
const ENTRY_SUFFIX = ".json";
const TEMP_SUFFIX = ".tmp";

type ReadOutcome = { state: "missing" } | { state: "corrupt"; reason: string } | { state: "ok"; entry: CacheEntry };

/**
 * On-disk cache of raw per-type payloads, one JSON file per (data type, date).
 */
@Injectable()
export class FileCacheService extends StandardService implements CacheStore {
  private readonly writeLocks = new Map<string, Promise<void>>();
  private stats: CacheStats = {
    hits: 0,
    misses: 0,
    expired: 0,
    corrupt: 0,
    writes: 0,
    swept: 0,
  };

  constructor(private readonly configService: ConfigService) {
    super();
  }

  override async initialize(): Promise<void> {
    const config = this.configService.getPipelineConfig();
    await fs.mkdir(config.cacheDir, { recursive: true });

    if (config.cacheSweepIntervalMs > 0) {
      this.createInterval(() => {
        this.sweep(config).catch(error => this.logError(toError(error), "Periodic cache sweep failed"));
      }, config.cacheSweepIntervalMs);
      this.logger.log(`Periodic cache sweep every ${config.cacheSweepIntervalMs}ms`);
    }
  }

  static keyFor(dataType: DataType, date: DateKey): string {
    return `${dataType}_${date}`;
  }

  async get(dataType: DataType, date: DateKey, config: PipelineConfig): Promise<CachePayload | undefined> {
    const key = FileCacheService.keyFor(dataType, date);
    const filePath = this.entryPath(key, config);
    const outcome = await this.readEntry(filePath);

    if (outcome.state === "missing") {
      this.stats.misses++;
      return undefined;
    }

    if (outcome.state === "corrupt") {
      this.stats.corrupt++;
      this.stats.misses++;
      this.logWarning(`Corrupt cache entry ${key} removed: ${outcome.reason}`, "Cache", {
        code: ErrorCode.CACHE_CORRUPTION,
      });
      await this.removeFile(filePath);
      return undefined;
    }

    if (outcome.entry.dataType !== dataType || outcome.entry.date !== date) {
      this.stats.corrupt++;
      this.stats.misses++;
      this.logWarning(`Cache entry ${key} holds ${outcome.entry.dataType}_${outcome.entry.date}, removed`, "Cache", {
        code: ErrorCode.CACHE_CORRUPTION,
      });
      await this.removeFile(filePath);
      return undefined;
    }

    if (this.isExpired(outcome.entry, config, Date.now())) {
      this.stats.expired++;
      this.stats.misses++;
      this.logDebug(`Cache entry ${key} expired`, "Cache");
      await this.removeFile(filePath);
      return undefined;
    }

    this.stats.hits++;
    return outcome.entry.payload;
  }

  async put(dataType: DataType, date: DateKey, payload: CachePayload, config: PipelineConfig): Promise<void> {
    const key = FileCacheService.keyFor(dataType, date);
    const entry: CacheEntry = { dataType, date, storedAt: Date.now(), payload };

    await this.withKeyLock(key, async () => {
      const filePath = this.entryPath(key, config);
      const tempPath = `${filePath}.${uuidv4()}${TEMP_SUFFIX}`;

      await fs.mkdir(config.cacheDir, { recursive: true });
      try {
        await fs.writeFile(tempPath, JSON.stringify(entry), "utf8");
        await fs.rename(tempPath, filePath);
      } catch (error) {
        await this.removeFile(tempPath);
        throw error;
      }
    });

    this.stats.writes++;
  }

  /**
   * Delete every stale or unreadable entry. Returns the number of files removed.
   */
  async sweep(config: PipelineConfig): Promise<number> {
    let names: string[];
    try {
      names = await fs.readdir(config.cacheDir);
    } catch (error) {
      if (isNodeErrorWithCode(error, "ENOENT")) return 0;
      throw error;
    }

    const now = Date.now();
    let removed = 0;

    for (const name of names) {
      if (!name.endsWith(ENTRY_SUFFIX)) continue;

      const key = name.slice(0, -ENTRY_SUFFIX.length);
      const filePath = path.join(config.cacheDir, name);
      // A concurrent put lands either before the read or after the unlink
      await this.withKeyLock(key, async () => {
        const outcome = await this.readEntry(filePath);
        if (outcome.state === "missing") return;
        if (outcome.state === "corrupt" || this.isExpired(outcome.entry, config, now)) {
          if (await this.removeFile(filePath)) removed++;
        }
      });
    }

    this.stats.swept += removed;
    if (removed > 0) {
      this.logger.log(`Cache sweep removed ${removed} entr${removed === 1 ? "y" : "ies"} from ${config.cacheDir}`);
    }
    return removed;
  }

  getStats(): CacheStats {
    return { ...this.stats };
  }

  private entryPath(key: string, config: PipelineConfig): string {
    return path.join(config.cacheDir, `${key}${ENTRY_SUFFIX}`);
  }

  private isExpired(entry: CacheEntry, config: PipelineConfig, now: number): boolean {
    return now - entry.storedAt > config.cacheExpiryHours * MS_PER_HOUR;
  }

  private async readEntry(filePath: string): Promise<ReadOutcome> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf8");
    } catch (error) {
      if (isNodeErrorWithCode(error, "ENOENT")) return { state: "missing" };
      return { state: "corrupt", reason: errorMessage(error) };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      return { state: "corrupt", reason: `invalid JSON (${errorMessage(error)})` };
    }

    const entry = toCacheEntry(parsed);
    return entry ? { state: "ok", entry } : { state: "corrupt", reason: "unexpected entry shape" };
  }

  private async removeFile(filePath: string): Promise<boolean> {
    try {
      await fs.unlink(filePath);
      return true;
    } catch (error) {
      if (!isNodeErrorWithCode(error, "ENOENT")) {
        this.logWarning(`Could not remove ${filePath}: ${errorMessage(error)}`, "Cache");
      }
      return false;
    }
  }

  private async withKeyLock(key: string, task: () => Promise<void>): Promise<void> {
    const previous = this.writeLocks.get(key) ?? Promise.resolve();
    const current = previous.then(task);
    const settled = current.then(
      () => undefined,
      () => undefined
    );
    this.writeLocks.set(key, settled);

    try {
      await current;
    } finally {
      if (this.writeLocks.get(key) === settled) {
        this.writeLocks.delete(key);
      }
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isPartialReading(value: unknown): value is PartialReading {
  if (!isRecord(value) || typeof value.timestamp !== "number" || !Number.isFinite(value.timestamp)) {
    return false;
  }
  return Object.entries(value).every(([field, fieldValue]) => {
    if (field === "timestamp") return true;
    return fieldValue === null || (typeof fieldValue === "number" && Number.isFinite(fieldValue));
  });
}

function toCacheEntry(value: unknown): CacheEntry | undefined {
  if (!isRecord(value)) return undefined;

  const { dataType, date, storedAt, payload } = value;
  if (!isDataType(dataType) || typeof date !== "string") return undefined;
  if (typeof storedAt !== "number" || !Number.isFinite(storedAt)) return undefined;
  if (!Array.isArray(payload) || !payload.every(isPartialReading)) return undefined;

  return { dataType, date, storedAt, payload };
}
