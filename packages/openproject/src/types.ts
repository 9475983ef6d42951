export interface HalLink {
  href: string | null;
  title?: string;
}

export interface HalCollection<T> {
  _type: 'Collection';
  total: number;
  count: number;
  pageSize: number;
  offset: number;
  _embedded: {
    elements: T[];
  };
}

export interface OpWorkPackage {
  _type: 'WorkPackage';
  id: number;
  subject: string;
  _links: {
    self: HalLink;
    project: HalLink;
  };
}

export interface OpUser {
  _type: 'User';
  id: number;
  name: string;
  login?: string;
}

export interface OpProject {
  _type: 'Project';
  id: number;
  name: string;
  identifier: string;
}

export interface OpFormattable {
  format?: string;
  raw: string | null;
  html?: string;
}

export interface OpTimeEntry {
  _type: 'TimeEntry';
  id: number;
  comment: OpFormattable | null;
  spentOn: string;
  hours: string;
  _links: {
    workPackage?: HalLink;
    project?: HalLink;
    user?: HalLink;
  };
}

export interface OpTimeEntryRequest {
  _links: {
    workPackage: { href: string };
    project: { href: string };
    user: { href: string };
    activity?: { href: string };
  };
  hours: string;
  spentOn: string;
  comment: { raw: string };
}

/**
 * API v3 filter: `{ name: { operator, values } }`.
 */
export type OpFilter = Record<string, { operator: string; values: string[] }>;
