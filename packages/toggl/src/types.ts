export interface TogglMe {
  id: number;
  email: string;
  fullname: string;
  default_workspace_id: number;
}

export interface TogglProject {
  id: number;
  workspace_id: number;
  name: string;
  active: boolean;
}

export interface TogglReportTimeEntry {
  id: number;
  seconds: number;
  start: string;
  stop: string | null;
  at: string;
}

/**
 * Row of the detailed report: entries grouped by identical attributes.
 */
export interface TogglReportRow {
  user_id: number;
  username: string;
  project_id: number | null;
  task_id: number | null;
  billable: boolean;
  description: string | null;
  tag_ids: number[];
  time_entries: TogglReportTimeEntry[];
  row_number: number;
}

export interface TogglPageCursor {
  firstId: number;
  firstRowNumber: number;
  firstTimestamp?: number;
}

export interface TogglReportPage {
  rows: TogglReportRow[];
  next: TogglPageCursor | null;
}

export interface TogglSearchParams {
  startDate: string;
  endDate: string;
  pageSize?: number;
  cursor?: TogglPageCursor;
}
