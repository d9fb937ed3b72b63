#!/usr/bin/env node

/**
 * Text Transformer Toolbox - Entry Point
 */

import { getConfig, printConfigInfo } from './config.js';
import { TransformerApp } from './presentation/TransformerApp.js';

async function main() {
  let app: TransformerApp | null = null;

  try {
    // Load configuration
    const config = getConfig();

    // Print configuration info
    printConfigInfo(config);

    // Create and start the web app
    app = new TransformerApp(config);
    await app.start();

    // Print catalog and Ollama status
    await app.printStats();

    console.error('\n🚀 Server is running. Press Ctrl+C to stop.\n');

    // Setup graceful shutdown
    const shutdown = async (signal: string) => {
      console.log(`\n\n📛 Received ${signal}, shutting down gracefully...`);

      if (app) {
        await app.shutdown();
      }

      console.log('👋 Goodbye!\n');
      process.exit(0);
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));

    // Also handle uncaught errors
    process.on('uncaughtException', (error) => {
      console.error('💥 Uncaught Exception:', error);
      void shutdown('UNCAUGHT_EXCEPTION');
    });

    process.on('unhandledRejection', (reason, promise) => {
      console.error('💥 Unhandled Rejection at:', promise, 'reason:', reason);
      void shutdown('UNHANDLED_REJECTION');
    });

  } catch (error) {
    console.error('💥 Fatal error in main():', error);

    // Cleanup on error
    if (app) {
      await app.shutdown();
    }

    process.exit(1);
  }
}

// Start the server
void main();
