#!/usr/bin/env node

import { cfg, createModuleLogger, logShutdown } from '@planboard/core';
import { createApp } from './app.js';

const logger = createModuleLogger('server-main');

function main(): void {
  const server = createApp().listen(cfg.PORT, () => {
    logger.info({ port: cfg.PORT }, `Planboard server listening on port ${cfg.PORT}`);
  });

  const handleShutdown = async (signal: string) => {
    await logShutdown(logger, signal, () => {
      server.close();
    });
    process.exit(0);
  };

  process.on('SIGINT', () => void handleShutdown('SIGINT'));
  process.on('SIGTERM', () => void handleShutdown('SIGTERM'));
}

main();
