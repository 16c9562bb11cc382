/**
 * Application Configuration
 *
 * Loads and validates environment variables (a `.env` file is read by
 * `@nestjs/config` first) and turns them into the typed `AppConfig` that is
 * injected wherever settings are needed.
 *
 * ## Usage:
 * ```typescript
 * constructor(private configService: ConfigService<AppConfig, true>) {}
 *
 * const { pollIntervalMs } = this.configService.get('export', { infer: true });
 * ```
 *
 * @module Configuration
 */

import { validateEnv, type EnvConfig } from './validation.schema';

export interface AppConfig {
  nodeEnv: string;
  logLevel: string;
  confluence: {
    /** Site origin without a trailing `/wiki`, e.g. `https://example.atlassian.net` */
    baseUrl: string;
    username: string;
    apiToken: string;
  };
  /**
   * Batch export settings.
   *
   * ### pollIntervalMs (Environment: POLL_INTERVAL_MS)
   * - Fixed delay between two task status requests
   *
   * ### maxWaitMs (Environment: POLL_TIMEOUT_MS)
   * - Ceiling on the time spent waiting for one task
   * - Raise it for very large pages; the interval does not adapt
   */
  export: {
    pagesFile: string;
    outputDir: string;
    pollIntervalMs: number;
    maxWaitMs: number;
    requestTimeoutMs: number;
  };
}

/**
 * Strips trailing slashes and a trailing `/wiki` context path, since request
 * paths are built with `/wiki/...` themselves.
 */
export function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl
    .trim()
    .replace(/\/+$/, '')
    .replace(/\/wiki$/i, '');
}

export function buildConfig(env: EnvConfig): AppConfig {
  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    confluence: {
      baseUrl: normalizeBaseUrl(env.CONFLUENCE_BASE_URL),
      username: env.CONFLUENCE_USER,
      apiToken: env.CONFLUENCE_PASS,
    },
    export: {
      pagesFile: env.PAGES_FILE,
      outputDir: env.EXPORT_DIR,
      pollIntervalMs: env.POLL_INTERVAL_MS,
      maxWaitMs: env.POLL_TIMEOUT_MS,
      requestTimeoutMs: env.HTTP_TIMEOUT_MS,
    },
  };
}

export default (): AppConfig => buildConfig(validateEnv(process.env));
