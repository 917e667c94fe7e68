/**
 * Scope of one extraction request, after validation.
 */
export const TOOL_NAMES = ['pr-extractor', 'file-history-extractor'] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export type PullRequestState = 'open' | 'closed' | 'all';

export interface ScopeArgs {
  org: string;
  repos: string[];
  since?: string; // normalized ISO 8601
  until?: string;
  verbose: boolean;
}

export interface PullRequestArgs extends ScopeArgs {
  state: PullRequestState;
  mergedOnly: boolean;
}

export interface FileHistoryArgs extends ScopeArgs {
  filePath: string;
  sha?: string;
}

export type ExtractionArgs = PullRequestArgs | FileHistoryArgs;

export type ExtractionRequest =
  | { tool: 'pr-extractor'; args: PullRequestArgs }
  | { tool: 'file-history-extractor'; args: FileHistoryArgs };

/**
 * Optional date bounds. No bounds at all means the whole history.
 */
export interface ExtractionWindow {
  since?: Date;
  until?: Date;
}

export function toWindow(args: ScopeArgs): ExtractionWindow {
  return {
    since: args.since ? new Date(args.since) : undefined,
    until: args.until ? new Date(args.until) : undefined,
  };
}

export function isUnbounded(window: ExtractionWindow): boolean {
  return !window.since && !window.until;
}

export function isWithinWindow(timestamp: string, window: ExtractionWindow): boolean {
  const time = Date.parse(timestamp);
  if (Number.isNaN(time)) return false;
  if (window.since && time < window.since.getTime()) return false;
  if (window.until && time > window.until.getTime()) return false;
  return true;
}
