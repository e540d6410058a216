import type { Redis } from "ioredis";
import { StateUnavailableError } from "../errors.js";

export interface LockRecord {
  token: string;
  acquiredAt: number;
}

/**
 * Raw storage under the job state store. Records and history entries are
 * opaque strings; validation happens one level up.
 */
export interface StateBackend {
  read(jobId: string): Promise<string | null>;
  write(jobId: string, raw: string): Promise<void>;
  /** Drops the record, its history and its lock. */
  remove(jobId: string): Promise<void>;
  ids(): Promise<string[]>;
  /** Prepends `raw` and trims the list to `limit` entries. */
  pushHistory(jobId: string, raw: string, limit: number): Promise<void>;
  /** Newest first. */
  history(jobId: string): Promise<string[]>;
  /** Set-if-absent. `ttlMs` is a backstop; staleness is judged by the store. */
  tryLock(jobId: string, lock: LockRecord, ttlMs: number): Promise<boolean>;
  readLock(jobId: string): Promise<LockRecord | null>;
  /** Deletes the lock only while it still carries `token`. */
  releaseLock(jobId: string, token: string): Promise<boolean>;
}

export interface StateRedisKeys {
  jobPrefix: string;
  jobsSet: string;
}

const DEFAULT_REDIS_KEYS: StateRedisKeys = {
  jobPrefix: "broker:job:",
  jobsSet: "broker:jobs",
};

const RELEASE_LOCK_LUA = `
local raw = redis.call('GET', KEYS[1])
if not raw then return 0 end
local ok, lock = pcall(cjson.decode, raw)
if ok and type(lock) == 'table' and lock.token == ARGV[1] then
  return redis.call('DEL', KEYS[1])
end
return 0
`;

export class RedisStateBackend implements StateBackend {
  private keys: StateRedisKeys;

  constructor(
    private redis: Redis | null,
    keys?: StateRedisKeys,
  ) {
    this.keys = keys ?? DEFAULT_REDIS_KEYS;
  }

  private ensureRedis(): Redis {
    if (!this.redis) throw new StateUnavailableError("Redis unavailable");
    return this.redis;
  }

  private recordKey(jobId: string) {
    return `${this.keys.jobPrefix}${jobId}`;
  }

  private historyKey(jobId: string) {
    return `${this.keys.jobPrefix}${jobId}:history`;
  }

  private lockKey(jobId: string) {
    return `${this.keys.jobPrefix}${jobId}:lock`;
  }

  async read(jobId: string): Promise<string | null> {
    return this.ensureRedis().get(this.recordKey(jobId));
  }

  async write(jobId: string, raw: string): Promise<void> {
    const r = this.ensureRedis();
    await r.multi().set(this.recordKey(jobId), raw).sadd(this.keys.jobsSet, jobId).exec();
  }

  async remove(jobId: string): Promise<void> {
    const r = this.ensureRedis();
    await r
      .multi()
      .del(this.recordKey(jobId), this.historyKey(jobId), this.lockKey(jobId))
      .srem(this.keys.jobsSet, jobId)
      .exec();
  }

  async ids(): Promise<string[]> {
    return this.ensureRedis().smembers(this.keys.jobsSet);
  }

  async pushHistory(jobId: string, raw: string, limit: number): Promise<void> {
    const r = this.ensureRedis();
    const key = this.historyKey(jobId);
    await r.multi().lpush(key, raw).ltrim(key, 0, Math.max(0, limit - 1)).exec();
  }

  async history(jobId: string): Promise<string[]> {
    return this.ensureRedis().lrange(this.historyKey(jobId), 0, -1);
  }

  async tryLock(jobId: string, lock: LockRecord, ttlMs: number): Promise<boolean> {
    const r = this.ensureRedis();
    const result = await r.set(this.lockKey(jobId), JSON.stringify(lock), "PX", ttlMs, "NX");
    return result === "OK";
  }

  async readLock(jobId: string): Promise<LockRecord | null> {
    const raw = await this.ensureRedis().get(this.lockKey(jobId));
    return raw ? parseLock(raw) : null;
  }

  async releaseLock(jobId: string, token: string): Promise<boolean> {
    const r = this.ensureRedis();
    const deleted = (await r.eval(RELEASE_LOCK_LUA, 1, this.lockKey(jobId), token)) as number;
    return deleted === 1;
  }
}

/** Single-process backend for development and tests. */
export class MemoryStateBackend implements StateBackend {
  private records = new Map<string, string>();
  private histories = new Map<string, string[]>();
  private locks = new Map<string, LockRecord>();

  async read(jobId: string): Promise<string | null> {
    return this.records.get(jobId) ?? null;
  }

  async write(jobId: string, raw: string): Promise<void> {
    this.records.set(jobId, raw);
  }

  async remove(jobId: string): Promise<void> {
    this.records.delete(jobId);
    this.histories.delete(jobId);
    this.locks.delete(jobId);
  }

  async ids(): Promise<string[]> {
    return [...this.records.keys()];
  }

  async pushHistory(jobId: string, raw: string, limit: number): Promise<void> {
    const list = [raw, ...(this.histories.get(jobId) ?? [])];
    this.histories.set(jobId, list.slice(0, Math.max(1, limit)));
  }

  async history(jobId: string): Promise<string[]> {
    return [...(this.histories.get(jobId) ?? [])];
  }

  async tryLock(jobId: string, lock: LockRecord): Promise<boolean> {
    if (this.locks.has(jobId)) return false;
    this.locks.set(jobId, { ...lock });
    return true;
  }

  async readLock(jobId: string): Promise<LockRecord | null> {
    const lock = this.locks.get(jobId);
    return lock ? { ...lock } : null;
  }

  async releaseLock(jobId: string, token: string): Promise<boolean> {
    if (this.locks.get(jobId)?.token !== token) return false;
    this.locks.delete(jobId);
    return true;
  }
}

function parseLock(raw: string): LockRecord | null {
  try {
    const value: unknown = JSON.parse(raw);
    if (
      typeof value === "object" &&
      value !== null &&
      "token" in value &&
      "acquiredAt" in value &&
      typeof value.token === "string" &&
      typeof value.acquiredAt === "number"
    ) {
      return { token: value.token, acquiredAt: value.acquiredAt };
    }
    return null;
  } catch {
    return null;
  }
}
