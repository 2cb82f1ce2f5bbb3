#!/usr/bin/env node
import { existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { loadEnvFiles } from '@spatial-audio/shared-infrastructure';

const moduleDir = dirname(fileURLToPath(import.meta.url));
const repoEnvPath = resolve(moduleDir, '../../../.env');
const envFiles = ['.env'];
if (existsSync(repoEnvPath)) {
  envFiles.push(repoEnvPath);
}
loadEnvFiles({ files: envFiles, cwd: process.cwd(), assignToProcess: true, override: false });

// the pino root logger reads LOG_LEVEL when first imported, so load it after the env files
const { logger } = await import('../src/infrastructure/logger.js');
const { startHttpServer } = await import('../src/transport/http-server.js');

try {
  await startHttpServer();
} catch (error: unknown) {
  logger.error(error instanceof Error ? error : String(error), { event: 'http_server_start' });
  process.exitCode = 1;
}
