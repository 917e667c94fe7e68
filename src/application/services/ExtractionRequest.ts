import { z } from 'zod';
import {
  ExtractionRequest,
  FileHistoryArgs,
  PullRequestArgs,
  TOOL_NAMES,
  ToolName,
} from '../../core/entities/ExtractionRequest.js';
import { ValidationError } from '../../core/errors.js';
import { normalizeDateBound, WindowBoundary } from '../../utils/dates.js';
import { normalizeCredential } from '../../utils/credentials.js';

/**
 * Names the original HTTP service used for the two tools
 */
const TOOL_ALIASES: Record<string, ToolName> = {
  'pull-request-extractor': 'pr-extractor',
  'file-commit-history': 'file-history-extractor',
};

/**
 * Form fields arrive in snake_case
 */
const FIELD_ALIASES: Record<string, string> = {
  merged_only: 'mergedOnly',
  file_path: 'filePath',
};

function camelizeKeys(raw: unknown): unknown {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return raw;
  }
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    result[FIELD_ALIASES[key] ?? key] = value;
  }
  return result;
}

const reposField = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (Array.isArray(value) ? value : value.split(/[\s,]+/)))
  .transform((repos) => repos.map((repo) => repo.trim()).filter((repo) => repo.length > 0))
  .pipe(z.array(z.string()).min(1, 'At least 1 repository is required'));

const dateField = (boundary: WindowBoundary) =>
  z
    .string()
    .nullish()
    .transform((value, ctx) => {
      if (!value || !value.trim()) return undefined;
      const normalized = normalizeDateBound(value, boundary);
      if (!normalized) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Invalid date format: ${value}. Use YYYY-MM-DD or full ISO.`,
        });
        return z.NEVER;
      }
      return normalized;
    });

const ScopeSchema = z.object({
  org: z.string().trim().min(1, 'Organization must not be empty'),
  repos: reposField,
  since: dateField('start'),
  until: dateField('end'),
  verbose: z.boolean().default(false),
});

function checkWindowOrder(args: { since?: string; until?: string }, ctx: z.RefinementCtx): void {
  if (args.since && args.until && args.since > args.until) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['since'],
      message: `since (${args.since}) is after until (${args.until})`,
    });
  }
}

export const PullRequestArgsSchema: z.ZodType<PullRequestArgs, z.ZodTypeDef, unknown> = z.preprocess(
  camelizeKeys,
  ScopeSchema.extend({
    state: z.enum(['open', 'closed', 'all']).default('closed'),
    mergedOnly: z.boolean().default(true),
  }).superRefine(checkWindowOrder)
);

export const FileHistoryArgsSchema: z.ZodType<FileHistoryArgs, z.ZodTypeDef, unknown> = z.preprocess(
  camelizeKeys,
  ScopeSchema.extend({
    filePath: z
      .string({ required_error: 'File path is required' })
      .trim()
      .transform((value) => value.replace(/^\/+/, ''))
      .pipe(z.string().min(1, 'File path is required')),
    sha: z
      .string()
      .trim()
      .nullish()
      .transform((value) => value || undefined),
  }).superRefine(checkWindowOrder)
);

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((issue) => `${issue.path.join('.') || 'args'}: ${issue.message}`);
}

export function parseToolName(raw: unknown): ToolName {
  if (typeof raw === 'string') {
    const name = TOOL_ALIASES[raw] ?? raw;
    const parsed = z.enum(TOOL_NAMES).safeParse(name);
    if (parsed.success) return parsed.data;
  }
  throw new ValidationError(`Invalid 'type': expected one of ${TOOL_NAMES.join(', ')}`, ['type: invalid tool']);
}

/**
 * Validate a raw request into a typed one. Throws ValidationError listing
 * every issue.
 */
export function parseExtractionRequest(tool: unknown, rawArgs: unknown): ExtractionRequest {
  const name = parseToolName(tool);
  const schema = name === 'pr-extractor' ? PullRequestArgsSchema : FileHistoryArgsSchema;
  const result = schema.safeParse(rawArgs ?? {});
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ValidationError(`Invalid arguments for ${name}: ${issues.join('; ')}`, issues);
  }

  const args = result.data;
  if (name === 'pr-extractor' && 'mergedOnly' in args) {
    return { tool: name, args };
  }
  if (name === 'file-history-extractor' && 'filePath' in args) {
    return { tool: name, args };
  }
  throw new ValidationError(`Invalid arguments for ${name}`);
}

export function parseCredential(raw: unknown): string {
  const credential = typeof raw === 'string' ? normalizeCredential(raw) : '';
  if (!credential) {
    throw new ValidationError('GitHub token is required', ['token: Required']);
  }
  return credential;
}

/**
 * Command-line form of a request, the way the extractor would be invoked by
 * hand. The token is always shown as `[TOKEN]`.
 */
export function buildCommandPreview(request: ExtractionRequest): string[] {
  const { args } = request;
  const command = [request.tool, '--org', args.org, '--repos', ...args.repos];

  if (request.tool === 'file-history-extractor') {
    command.push('--file-path', request.args.filePath);
  }
  if (args.since) command.push('--since', args.since);
  if (args.until) command.push('--until', args.until);

  if (request.tool === 'pr-extractor') {
    command.push('--state', request.args.state);
    command.push(request.args.mergedOnly ? '--merged-only' : '--no-merged-only');
  } else if (request.args.sha) {
    command.push('--sha', request.args.sha);
  }

  if (args.verbose) command.push('--verbose');
  command.push('--token', '[TOKEN]');
  return command;
}
