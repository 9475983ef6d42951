export { TogglClient, readNextCursor } from './client.js';
export type { TogglClientOptions } from './client.js';
export { mapReportRow, mapTimeEntry } from './mapper.js';
export { createTogglSource, unavailableProjectName, TOGGL_SOURCE_ID } from './source.js';
export type { TogglSourceOptions } from './source.js';
export type {
  TogglMe,
  TogglProject,
  TogglReportRow,
  TogglReportTimeEntry,
  TogglReportPage,
  TogglPageCursor,
  TogglSearchParams,
} from './types.js';
