import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { JobService } from '../../application/services/JobService.js';
import { TOOL_NAMES } from '../../core/entities/ExtractionRequest.js';
import { JobSnapshot } from '../../core/entities/Job.js';
import { ValidationError, describeError } from '../../core/errors.js';

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export function textResult(text: string): ToolResult {
  return { content: [{ type: 'text', text }] };
}

export function errorResult(prefix: string, error: unknown): ToolResult {
  const issues = error instanceof ValidationError && error.issues.length > 0 ? `\n- ${error.issues.join('\n- ')}` : '';
  return { isError: true, content: [{ type: 'text', text: `${prefix}: ${describeError(error)}${issues}` }] };
}

export function formatSnapshot(snapshot: JobSnapshot, logLines: number = 10): string {
  const outputs = snapshot.outputs.length === 0 ? 'none yet' : snapshot.outputs.map((file) => `\`${file}\``).join(', ');
  const tail = logLines === 0 ? [] : snapshot.log.slice(-logLines);
  return `# Job ${snapshot.jobId}

- Tool: ${snapshot.tool}
- Status: ${snapshot.status}
- Progress: ${snapshot.progress}%
- Message: ${snapshot.message}
- Outputs: ${outputs}
${tail.length === 0 ? '' : `\n## Recent log\n\`\`\`\n${tail.join('\n')}\n\`\`\``}`;
}

export const submitExtractionShape = {
  type: z.enum(TOOL_NAMES).describe('Extractor to run'),
  token: z.string().describe('GitHub token used for this job only'),
  org: z.string().describe('Organization or user owning the repositories'),
  repos: z.array(z.string()).min(1).describe('Repository names'),
  since: z.string().optional().describe('Window start, YYYY-MM-DD or ISO 8601'),
  until: z.string().optional().describe('Window end, YYYY-MM-DD or ISO 8601'),
  state: z.enum(['open', 'closed', 'all']).optional().describe('Pull request state (pr-extractor)'),
  mergedOnly: z.boolean().optional().describe('Only merged pull requests (pr-extractor, default true)'),
  filePath: z.string().optional().describe('File to trace (file-history-extractor)'),
  sha: z.string().optional().describe('Branch or commit to list from (file-history-extractor)'),
  verbose: z.boolean().optional(),
  wait: z.boolean().optional().describe('Wait for the job to finish before answering'),
};

export type SubmitExtractionInput = z.infer<z.ZodObject<typeof submitExtractionShape>>;

export async function submitExtraction(jobService: JobService, input: SubmitExtractionInput): Promise<ToolResult> {
  const { type, token, wait, ...args } = input;
  try {
    const jobId = jobService.submit(type, args, token);
    if (!wait) {
      return textResult(`Job ${jobId} started. Use get-job-status with this id to follow it.`);
    }
    return textResult(formatSnapshot(await jobService.waitFor(jobId)));
  } catch (error) {
    return errorResult('Error starting extraction', error);
  }
}

export const getJobStatusShape = {
  jobId: z.string().describe('Id returned by submit-extraction'),
  logLines: z.number().int().min(0).max(400).optional().describe('How many log lines to include (default 10)'),
};

export type GetJobStatusInput = z.infer<z.ZodObject<typeof getJobStatusShape>>;

export function getJobStatus(jobService: JobService, input: GetJobStatusInput): ToolResult {
  try {
    return textResult(formatSnapshot(jobService.status(input.jobId), input.logLines));
  } catch (error) {
    return errorResult('Error getting job status', error);
  }
}

/**
 * Register the extraction tools
 */
export function registerExtractionTools(server: McpServer, jobService: JobService) {
  server.tool(
    'submit-extraction',
    'Start a GitHub extraction job (pull requests or file commit history) and return its id',
    submitExtractionShape,
    async (input) => submitExtraction(jobService, input)
  );

  server.tool(
    'get-job-status',
    'Get status, progress, recent log and output files of an extraction job',
    getJobStatusShape,
    async (input) => getJobStatus(jobService, input)
  );
}
