import { z } from 'zod';

/**
 * Configuration types for symbolscope
 */

export interface ScoutConfig {
  /**
   * Glob patterns excluded from scans
   */
  exclude: string[];

  /**
   * File pattern used when a request names none
   */
  defaultPattern: string;

  /**
   * Whether remote targets go through the repository cache by default
   */
  useCache: boolean;

  cache: CacheConfig;

  git: GitConfig;

  github: GitHubConfig;

  output: OutputConfig;
}

export interface CacheConfig {
  /**
   * Cache root; one subdirectory per cached clone
   */
  dir: string;

  /**
   * Entries older than this are re-cloned
   */
  maxAgeHours: number;

  /**
   * Eviction ceiling for the sum of all entries
   */
  maxSizeMb: number;

  /**
   * Long-lived volume mode (larger ceiling, longer TTL)
   */
  persistent: boolean;
}

export interface GitConfig {
  /**
   * Wall-clock limit for a clone in milliseconds
   */
  cloneTimeoutMs: number;

  /**
   * Wall-clock limit for grep and blame in milliseconds
   */
  commandTimeoutMs: number;
}

export interface GitHubConfig {
  token?: string;
  apiBaseUrl: string;
  rawBaseUrl: string;
}

export interface OutputConfig {
  /**
   * Rows shown in text reports before trimming
   */
  maxResults: number;
}

const positive = z.number().positive();

export const PartialScoutConfigSchema = z
  .object({
    exclude: z.array(z.string()),
    defaultPattern: z.string().min(1),
    useCache: z.boolean(),
    cache: z
      .object({
        dir: z.string().min(1),
        maxAgeHours: positive,
        maxSizeMb: positive,
        persistent: z.boolean(),
      })
      .partial(),
    git: z
      .object({
        cloneTimeoutMs: positive,
        commandTimeoutMs: positive,
      })
      .partial(),
    github: z
      .object({
        token: z.string(),
        apiBaseUrl: z.string().url(),
        rawBaseUrl: z.string().url(),
      })
      .partial(),
    output: z
      .object({
        maxResults: z.number().int().positive(),
      })
      .partial(),
  })
  .partial();

/**
 * Partial configuration for overrides
 */
export type PartialScoutConfig = z.infer<typeof PartialScoutConfigSchema>;
