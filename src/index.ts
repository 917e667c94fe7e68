#!/usr/bin/env node

/**
 * Repo Extract - Entry Point
 *
 * Wires the job service to its two surfaces: the HTTP API and the MCP
 * stdio server.
 */

import { getConfig, printConfigInfo } from './config.js';
import { AuditLog } from './infrastructure/audit/AuditLog.js';
import { JobQueue } from './infrastructure/queue/JobQueue.js';
import { WebServer } from './infrastructure/web/WebServer.js';
import { JobService, gitHubClientProvider } from './application/services/JobService.js';
import { McpServer } from './presentation/McpServer.js';

async function main() {
  let mcpServer: McpServer | null = null;
  let webServer: WebServer | null = null;

  try {
    const config = getConfig();
    printConfigInfo(config);

    const auditLog = new AuditLog(config.storage.auditLogPath);
    const jobQueue = new JobQueue({
      outputRoot: config.storage.outputRoot,
      auditLog,
      logTailLimit: config.storage.logTailLimit,
      debug: config.server.debug,
    });
    const jobService = new JobService(jobQueue, gitHubClientProvider(config.github));

    if (config.web.enabled) {
      webServer = new WebServer(jobService, auditLog, config.web.port);
      await webServer.start();
    }

    if (config.mcp.enabled) {
      mcpServer = new McpServer(config, jobService);
      await mcpServer.start();
    }

    if (!webServer && !mcpServer) {
      console.error('⚠️ Neither the HTTP API nor MCP is enabled, nothing to serve.');
      process.exit(1);
    }

    // Setup graceful shutdown
    const shutdown = async (signal: string) => {
      console.error(`\n\n📛 Received ${signal}, shutting down gracefully...`);

      if (mcpServer) {
        await mcpServer.shutdown();
      }

      if (webServer && webServer.isRunning()) {
        await webServer.stop();
      }

      console.error('👋 Goodbye!\n');
      process.exit(0);
    };

    const onSignal = (signal: string) => {
      shutdown(signal).catch((error: unknown) => {
        console.error('💥 Shutdown failed:', error);
        process.exit(1);
      });
    };

    process.on('SIGINT', () => onSignal('SIGINT'));
    process.on('SIGTERM', () => onSignal('SIGTERM'));

    process.on('uncaughtException', (error) => {
      console.error('💥 Uncaught Exception:', error);
      onSignal('UNCAUGHT_EXCEPTION');
    });

    process.on('unhandledRejection', (reason) => {
      console.error('💥 Unhandled Rejection:', reason);
      onSignal('UNHANDLED_REJECTION');
    });
  } catch (error) {
    console.error('💥 Fatal error in main():', error);

    if (webServer && webServer.isRunning()) {
      await webServer.stop();
    }

    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('💥 Fatal error:', error);
  process.exit(1);
});
