#!/usr/bin/env node

/**
 * Document Job Orchestrator - Entry Point
 */

import { getConfig, printConfigInfo } from './config.js';
import { JobServer } from './presentation/JobServer.js';

async function main() {
  let server: JobServer | null = null;

  try {
    // Load configuration
    const config = getConfig();

    // Print configuration info
    printConfigInfo(config);

    server = new JobServer(config);
    await server.start();
    server.printStats();

    console.error('\nServer is running. Press Ctrl+C to stop.\n');

    let shuttingDown = false;
    const shutdown = async (signal: string, exitCode: number = 0) => {
      if (shuttingDown) return;
      shuttingDown = true;
      console.error(`\nReceived ${signal}, shutting down gracefully...`);

      try {
        if (server) {
          await server.shutdown();
        }
      } catch (error) {
        console.error('Error during shutdown:', error);
        exitCode = 1;
      }

      console.error('Goodbye!\n');
      process.exit(exitCode);
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));

    process.on('uncaughtException', (error) => {
      console.error('Uncaught Exception:', error);
      void shutdown('UNCAUGHT_EXCEPTION', 1);
    });

    process.on('unhandledRejection', (reason) => {
      console.error('Unhandled Rejection:', reason);
      void shutdown('UNHANDLED_REJECTION', 1);
    });
  } catch (error) {
    console.error('Fatal error in main():', error);

    if (server) {
      await server.shutdown().catch((shutdownError: unknown) => {
        console.error('Error during shutdown:', shutdownError);
      });
    }

    process.exit(1);
  }
}

// Start the server
void main();
