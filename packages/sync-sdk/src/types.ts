/**
 * A time entry as fetched from the tracking service.
 * `start`/`stop` keep the offset the source reported them in.
 */
export interface SourceEntry {
  sourceId: string;
  description: string;
  start: string;
  stop: string | null;
  /** Negative while the entry is still running. */
  durationSeconds: number;
  userName: string;
  projectName: string | null;
  workspaceId: string;
}

/**
 * Inclusive calendar-date range, `YYYY-MM-DD`.
 */
export interface DateRange {
  startDate: string;
  endDate: string;
}

export interface TimeSourceManifest {
  id: string;
  name: string;
}

export interface TimeSource {
  manifest: TimeSourceManifest;
  /**
   * Lazy and restartable: every iteration starts a fresh traversal.
   */
  entries(range: DateRange): AsyncIterable<SourceEntry>;
}

export interface WorkItem {
  id: string;
  subject: string;
  projectId: string;
}

export interface WorkTimeRecord {
  id: string;
  workItemId: string;
  comment: string;
}

export interface WorkTimeDraft {
  workItemId: string;
  projectId: string;
  userId: string;
  activityId?: string;
  spentOn: string;
  durationSeconds: number;
  comment: string;
}

/**
 * What the importer needs from the project-management side.
 */
export interface TargetService {
  getWorkItem(id: string): Promise<WorkItem | null>;
  findUserByName(name: string): Promise<string | null>;
  findProjectByName(name: string): Promise<string | null>;
  listWorkTimeRecords(workItemId: string): Promise<WorkTimeRecord[]>;
  createWorkTimeRecord(draft: WorkTimeDraft): Promise<string>;
}
