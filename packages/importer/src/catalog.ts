import type { SourceEntry, TargetService, WorkItem } from '@timelog/sync-sdk';
import { SingleFlightMap } from './single-flight.js';
import type { NameAliases, Resolution, WorkItemReference } from './types.js';

function cacheKey(name: string): string {
  return name.trim().toLowerCase();
}

function applyAlias(name: string, aliases: Record<string, string> | undefined): string {
  return aliases?.[name] ?? aliases?.[name.trim()] ?? name;
}

/**
 * Run-scoped memo of target catalog lookups, one map per entity kind.
 * Discard it with the run: catalogs change between runs.
 */
export class CatalogCache {
  readonly workItems = new SingleFlightMap<WorkItem | null>();
  readonly users = new SingleFlightMap<string | null>();
  readonly projects = new SingleFlightMap<string | null>();

  /** Remote lookups issued so far. */
  get lookups(): number {
    return this.workItems.loadCount + this.users.loadCount + this.projects.loadCount;
  }
}

export class CatalogResolver {
  private readonly target: TargetService;
  private readonly cache: CatalogCache;
  private readonly aliases: NameAliases;

  constructor(target: TargetService, cache: CatalogCache = new CatalogCache(), aliases: NameAliases = {}) {
    this.target = target;
    this.cache = cache;
    this.aliases = aliases;
  }

  get lookups(): number {
    return this.cache.lookups;
  }

  /**
   * Map a reference plus the entry's user and project onto target ids.
   * Unresolvable entries come back as a reason, never as an exception;
   * lookup failures (network, auth) do propagate.
   */
  async resolve(reference: WorkItemReference, entry: SourceEntry): Promise<Resolution> {
    const workItemId = reference.canonicalId;
    if (workItemId === null) {
      return {
        status: 'unresolved',
        reason: 'NoReferenceFound',
        detail: 'description contains no work package reference',
      };
    }

    const workItem = await this.cache.workItems.get(workItemId, () => this.target.getWorkItem(workItemId));
    if (!workItem) {
      return {
        status: 'unresolved',
        reason: 'WorkItemNotFound',
        detail: `work package #${workItemId} does not exist or is not visible`,
      };
    }

    const userName = applyAlias(entry.userName, this.aliases.users);
    const userId = await this.cache.users.get(cacheKey(userName), () => this.target.findUserByName(userName));
    if (!userId) {
      return {
        status: 'unresolved',
        reason: 'UserNotMapped',
        detail: `user "${userName}" has no matching target user`,
      };
    }

    let projectId = workItem.projectId;
    if (entry.projectName !== null) {
      const projectName = applyAlias(entry.projectName, this.aliases.projects);
      const mapped = await this.cache.projects.get(cacheKey(projectName), () => this.target.findProjectByName(projectName));
      if (!mapped) {
        return {
          status: 'unresolved',
          reason: 'ProjectNotMapped',
          detail: `project "${projectName}" has no matching target project`,
        };
      }

      if (mapped !== workItem.projectId) {
        return {
          status: 'unresolved',
          reason: 'ProjectNotMapped',
          detail: `project "${projectName}" is #${mapped} but work package #${workItem.id} belongs to project #${workItem.projectId}`,
        };
      }

      projectId = mapped;
    }

    return {
      status: 'resolved',
      target: {
        workItemId: workItem.id,
        targetUserId: userId,
        targetProjectId: projectId,
      },
    };
  }
}
