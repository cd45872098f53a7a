/**
 * Output module exports - analysis issues
 */

export {
  describeType,
  typeMismatchIssue,
  checkCast,
  checkCasts,
  formatIssuesAsJSON,
  formatIssuesAsText,
  castSiteFromStrings,
} from './formatter.js';

export type {
  Issue,
  IssueLocation,
  AnalysisResponse,
  CastSite,
  IssueFormatOptions,
} from './formatter.js';
