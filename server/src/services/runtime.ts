// server/src/services/runtime.ts
// Process-wide singletons, built once at start-up. A bad engine config fails
// here, before the server accepts requests.

import { loadEngineConfig } from '../simulation/config.js';
import { DEFAULT_MAX_ENTRIES, ProfileCache } from '../simulation/profileCache.js';
import { SequelizeDataSource } from './sequelizeDataSource.js';

export const engineConfig = loadEngineConfig();
export const dataSource = new SequelizeDataSource();
export const profileCache = new ProfileCache({
  maxEntries: Number(process.env.PROFILE_CACHE_ENTRIES ?? DEFAULT_MAX_ENTRIES)
});
