export { OpenProjectClient, buildApiBaseUrl, encodeFilters, idFromHref } from './client.js';
export type { OpenProjectClientOptions } from './client.js';
export { createOpenProjectTarget, buildTimeEntryRequest, toIsoDuration } from './target.js';
export type {
  HalCollection,
  HalLink,
  OpFilter,
  OpProject,
  OpTimeEntry,
  OpTimeEntryRequest,
  OpUser,
  OpWorkPackage,
} from './types.js';
