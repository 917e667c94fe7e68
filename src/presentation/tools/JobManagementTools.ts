import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { JobService } from '../../application/services/JobService.js';
import { ToolResult, errorResult, textResult } from './ExtractionTools.js';

export const listJobsShape = {
  status: z
    .enum(['queued', 'running', 'succeeded', 'failed'])
    .optional()
    .describe('Filter jobs by status (optional)'),
};

export type ListJobsInput = z.infer<z.ZodObject<typeof listJobsShape>>;

export function listJobs(jobService: JobService, input: ListJobsInput): ToolResult {
  try {
    const jobs = jobService.list(input.status);
    const stats = jobService.statistics();

    const formattedJobs = jobs.map((job) => ({
      id: job.jobId,
      tool: job.tool,
      status: job.status,
      progress: `${job.progress}%`,
      message: job.message,
      outputs: job.outputs,
    }));

    const text = `# Job Queue Status

## Statistics
- Total Jobs: ${stats.total}
- Queued: ${stats.queued}
- Running: ${stats.running}
- Succeeded: ${stats.succeeded}
- Failed: ${stats.failed}

## Jobs
${formattedJobs.length === 0 ? 'No jobs found' : `\`\`\`json\n${JSON.stringify(formattedJobs, null, 2)}\n\`\`\``}`;

    return textResult(text);
  } catch (error) {
    return errorResult('Error listing jobs', error);
  }
}

/**
 * Register all job management tools
 */
export function registerJobManagementTools(server: McpServer, jobService: JobService) {
  server.tool(
    'list-jobs',
    'List all extraction jobs with their status and progress',
    listJobsShape,
    async (input) => listJobs(jobService, input)
  );
}
