import type { Config } from '../../config/index.js';
import type { Logger } from '../../utils/logger.js';
import { DEFAULT_RETRY_POLICY } from '../../utils/retry.js';
import { HttpCatalogClient } from './http-client.js';
import type { CatalogClient } from './types.js';

export { toCatalogError } from './errors.js';
export { HttpCatalogClient, type HttpCatalogOptions } from './http-client.js';
export * from './schema.js';
export type { CatalogClient, CatalogReader, CatalogWriter, PlaylistSnapshot, RemoteSnapshot } from './types.js';

export function createCatalogClient(settings: Config['catalog'], log: Logger): CatalogClient {
  if (!settings.baseUrl) {
    throw new Error('CATALOG_BASE_URL must be set to reach the remote catalog');
  }
  return new HttpCatalogClient({
    baseUrl: settings.baseUrl,
    token: settings.token,
    timeoutMs: settings.timeoutMs,
    retry: { ...DEFAULT_RETRY_POLICY, maxRetries: settings.maxRetries },
    log,
  });
}
