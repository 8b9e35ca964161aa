import { LOG_LEVELS, StructuredLogger, type LogLevel } from "../logger.js";
import { IdHash } from "../xds/nodeHash.js";
import { SnapshotCache } from "../xds/snapshotCache.js";
import { readBool, readEnum, readOptionalString, type EnvSource } from "./env.js";

/** Runtime configuration of a snapshot cache and its logger. */
export interface SnapshotCacheConfig {
  /** Aggregate discovery mode. */
  ads: boolean;
  /** Group key assigned to requests without a node identity. */
  fallbackGroupKey: string | null;
  logLevel: LogLevel;
  logFile: string | null;
  redactLogs: boolean;
}

/** Reads the `XDS_*` variables into a {@link SnapshotCacheConfig}. */
export function loadSnapshotCacheConfig(env: EnvSource = process.env): SnapshotCacheConfig {
  return {
    ads: readBool(env, "XDS_ADS", true),
    fallbackGroupKey: readOptionalString(env, "XDS_FALLBACK_GROUP") ?? null,
    logLevel: readEnum(env, "XDS_LOG_LEVEL", LOG_LEVELS, "info"),
    logFile: readOptionalString(env, "XDS_LOG_FILE") ?? null,
    redactLogs: readBool(env, "XDS_LOG_REDACT", true),
  };
}

/** Cache wired with the logger and resolver described by the environment. */
export interface ConfiguredSnapshotCache {
  config: SnapshotCacheConfig;
  logger: StructuredLogger;
  cache: SnapshotCache;
}

export function createSnapshotCacheFromEnv(env: EnvSource = process.env): ConfiguredSnapshotCache {
  const config = loadSnapshotCacheConfig(env);
  const logger = new StructuredLogger({
    logFile: config.logFile,
    level: config.logLevel,
    redactionEnabled: config.redactLogs,
  });
  const cache = new SnapshotCache({
    ads: config.ads,
    hash: new IdHash({ fallbackKey: config.fallbackGroupKey }),
    logger,
  });
  logger.info("xds_cache_configured", {
    ads: config.ads,
    fallback_group: config.fallbackGroupKey,
    log_level: config.logLevel,
  });
  return { config, logger, cache };
}
