import { McpServer as BaseMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Config } from '../config.js';
import { JobService } from '../application/services/JobService.js';
import { registerExtractionTools } from './tools/ExtractionTools.js';
import { registerJobManagementTools } from './tools/JobManagementTools.js';

/**
 * MCP surface over the job service, served on stdio
 */
export class McpServer {
  private server: BaseMcpServer;
  private debugLog: (message: string) => void;

  constructor(
    private config: Config,
    private jobService: JobService
  ) {
    this.debugLog = (message: string) => {
      if (config.server.debug) {
        console.error(`[DEBUG] ${message}`);
      }
    };

    this.server = new BaseMcpServer({
      name: config.server.name,
      version: config.server.version,
    });
    this.registerTools();
  }

  private registerTools() {
    registerExtractionTools(this.server, this.jobService);
    registerJobManagementTools(this.server, this.jobService);
    this.debugLog('Registered tools: submit-extraction, get-job-status, list-jobs');
  }

  /**
   * Start the MCP server
   */
  async start() {
    const transport = new StdioServerTransport();

    process.stdin.on('error', (error) => {
      console.error('⚠️ stdin error (non-fatal):', error.message);
    });

    process.stdin.on('end', () => {
      console.error('⚠️ stdin ended - client may have disconnected');
    });

    await this.server.connect(transport);
    console.error(`\n✅ ${this.config.server.name} MCP server running on stdio`);
  }

  async shutdown() {
    await this.server.close();
    this.debugLog('MCP server closed');
  }
}
