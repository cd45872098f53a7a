/**
 * Issue formatter - turns failed cast checks into analysis issues
 *
 * Issues use the record shape the analysis daemon reports to its clients:
 *
 *   { "status": "ok", "issues": [{ "type": "issue", "check_name": ...,
 *     "description": ..., "location": { "path": ..., "lines": { "begin": 3 } } }] }
 */

import type { CastOptions } from '../union/index.js';
import { UnionType } from '../union/index.js';

export interface IssueLocation {
  path: string;
  lines: {
    /** 1-based line number */
    begin: number;
  };
}

export interface Issue {
  type: 'issue';
  check_name: string;
  description: string;
  location: IssueLocation;
}

export interface AnalysisResponse {
  status: 'ok';
  issues: Issue[];
}

/**
 * A value of type `source` flowing into a slot of type `target`
 */
export interface CastSite {
  /** Issue type reported on failure, e.g. `TypeMismatchArgument` */
  checkName: string;
  source: UnionType;
  target: UnionType;
  path: string;
  line: number;
  /** Overrides the generated description */
  description?: string;
}

export interface IssueFormatOptions {
  /** Indentation for JSON output; 0 for a single line */
  indent?: number;
}

const DEFAULT_ISSUE_FORMAT_OPTIONS: Required<IssueFormatOptions> = {
  indent: 2,
};

/**
 * Render a union for messages; the empty union reads as `unknown`
 */
export function describeType(type: UnionType): string {
  return type.isEmpty() ? 'unknown' : type.serialize();
}

export function typeMismatchIssue(site: CastSite): Issue {
  return {
    type: 'issue',
    check_name: site.checkName,
    description:
      site.description ??
      `${describeType(site.source)} cannot be used where ${describeType(site.target)} is expected`,
    location: {
      path: site.path,
      lines: { begin: site.line },
    },
  };
}

/**
 * Check one cast site, returning an issue if the cast is not allowed
 */
export function checkCast(site: CastSite, options: CastOptions = {}): Issue | null {
  if (site.source.canCastTo(site.target, options)) {
    return null;
  }
  return typeMismatchIssue(site);
}

function compareCodeUnits(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Check several cast sites and collect the issues, ordered by path then line
 */
export function checkCasts(sites: readonly CastSite[], options: CastOptions = {}): Issue[] {
  const issues: Issue[] = [];
  for (const site of sites) {
    const issue = checkCast(site, options);
    if (issue !== null) {
      issues.push(issue);
    }
  }
  return issues.sort(
    (a, b) => compareCodeUnits(a.location.path, b.location.path) || a.location.lines.begin - b.location.lines.begin
  );
}

/**
 * Format issues as the daemon's JSON response body
 */
export function formatIssuesAsJSON(issues: readonly Issue[], options: IssueFormatOptions = {}): string {
  const opts = { ...DEFAULT_ISSUE_FORMAT_OPTIONS, ...options };
  const response: AnalysisResponse = { status: 'ok', issues: [...issues] };
  return opts.indent > 0 ? JSON.stringify(response, null, opts.indent) : JSON.stringify(response);
}

/**
 * Format issues one per line: `path:line check_name description`
 */
export function formatIssuesAsText(issues: readonly Issue[]): string {
  return issues
    .map((issue) => `${issue.location.path}:${issue.location.lines.begin} ${issue.check_name} ${issue.description}`)
    .join('\n');
}

/**
 * Parse both sides from type strings; convenience for tools and tests
 */
export function castSiteFromStrings(
  checkName: string,
  source: string,
  target: string,
  path: string,
  line: number
): CastSite {
  return {
    checkName,
    source: UnionType.fromString(source),
    target: UnionType.fromString(target),
    path,
    line,
  };
}
