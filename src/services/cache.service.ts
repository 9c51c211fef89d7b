import { createClient, type RedisClientType } from "redis";
import { env } from "../config/environment.js";
import { createLogger, logRedisConnection } from "../config/logger.js";
import type { PersistentCache } from "../types/clients.js";
import { errorMessage } from "../utils/errors.js";

const log = createLogger({ component: "cache" });

/**
 * Default TTL values in seconds
 */
export const CacheTTL = {
  /** Directory group membership - from DIRECTORY_CACHE_TTL_SECONDS */
  DIRECTORY_GROUPS: env.DIRECTORY_CACHE_TTL_SECONDS,
  /** Default TTL - 1 hour */
  DEFAULT: 60 * 60,
} as const;

/**
 * Redis Cache Service
 * Persists directory group memberships across runs.
 * Every operation degrades to a miss/no-op when Redis is unavailable.
 */
export class CacheService implements PersistentCache {
  private client: RedisClientType | null = null;
  private isConnected = false;
  private connectionPromise: Promise<void> | null = null;

  constructor(private readonly url: string | undefined = env.REDIS_URL) {}

  /**
   * Initialize Redis connection (no-op without REDIS_URL)
   */
  async connect(): Promise<void> {
    if (!this.url) {
      log.debug("REDIS_URL not set, directory cache is in-memory only");
      return;
    }

    if (this.connectionPromise) {
      return this.connectionPromise;
    }

    this.connectionPromise = this._connect(this.url);
    return this.connectionPromise;
  }

  private async _connect(url: string): Promise<void> {
    try {
      const client: RedisClientType = createClient({
        url,
        socket: {
          connectTimeout: 10000,
          reconnectStrategy: (retries) => {
            if (retries > 5) {
              log.warn("Redis: max reconnection attempts reached, running without cache");
              return false;
            }
            return Math.min(retries * 100, 3000);
          },
        },
      });

      client.on("error", (err: Error) => {
        logRedisConnection("error", err.message);
        this.isConnected = false;
      });

      client.on("ready", () => {
        logRedisConnection("connected");
        this.isConnected = true;
      });

      client.on("end", () => {
        logRedisConnection("disconnected");
        this.isConnected = false;
      });

      this.client = client;
      await client.connect();
    } catch (error) {
      log.warn({ error: errorMessage(error) }, "Redis: failed to connect, running without cache");
      this.isConnected = false;
      this.client = null;
    }
  }

  /**
   * Check if Redis is available
   */
  isAvailable(): boolean {
    return this.isConnected && this.client !== null;
  }

  /**
   * Set a value with optional TTL
   * @param value - Serialized as JSON
   * @param ttl - Seconds (default: 1 hour)
   */
  async set(key: string, value: unknown, ttl: number = CacheTTL.DEFAULT): Promise<void> {
    const client = this.client;
    if (!client || !this.isAvailable()) {
      log.trace({ key }, "SKIP SET (Redis unavailable)");
      return;
    }

    try {
      await client.setEx(key, ttl, JSON.stringify(value));
      log.trace({ key, ttl }, "SET");
    } catch (error) {
      log.error({ key, error: errorMessage(error) }, "Cache SET failed");
    }
  }

  /**
   * Get a value
   * @returns Parsed JSON, or null when missing or unavailable
   */
  async get(key: string): Promise<unknown> {
    const client = this.client;
    if (!client || !this.isAvailable()) {
      log.trace({ key }, "SKIP GET (Redis unavailable)");
      return null;
    }

    try {
      const value = await client.get(key);
      if (value === null) {
        log.trace({ key }, "MISS");
        return null;
      }
      log.trace({ key }, "HIT");
      const parsed: unknown = JSON.parse(value);
      return parsed;
    } catch (error) {
      log.error({ key, error: errorMessage(error) }, "Cache GET failed");
      return null;
    }
  }

  /**
   * Clear all keys matching a pattern
   * @param pattern - Key pattern (e.g. "auditor:directory-group:*")
   * @returns Number of keys deleted
   */
  async clearPattern(pattern: string): Promise<number> {
    const client = this.client;
    if (!client || !this.isAvailable()) {
      return 0;
    }

    try {
      const keys = await client.keys(pattern);
      if (keys.length === 0) {
        return 0;
      }

      const count = await client.del(keys);
      log.debug({ pattern, count }, "CLEAR PATTERN");
      return count;
    } catch (error) {
      log.error({ pattern, error: errorMessage(error) }, "Cache CLEAR PATTERN failed");
      return 0;
    }
  }

  /**
   * Disconnect from Redis
   */
  async disconnect(): Promise<void> {
    if (this.client) {
      const client = this.client;
      this.client = null;
      this.isConnected = false;
      this.connectionPromise = null;
      if (client.isOpen) {
        await client.quit();
      }
    }
  }
}

/**
 * Singleton cache service instance
 */
export const cacheService = new CacheService();
