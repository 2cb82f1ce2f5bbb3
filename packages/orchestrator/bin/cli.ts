#!/usr/bin/env node
import { existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import process from 'node:process';
import { fileURLToPath } from 'node:url';

import { loadEnvFiles } from '@spatial-audio/shared-infrastructure';

import { runCli } from '../src/cli.js';

const moduleDir = dirname(fileURLToPath(import.meta.url));
const repoEnvPath = resolve(moduleDir, '../../../.env');
const envFiles = ['.env'];
if (existsSync(repoEnvPath)) {
  envFiles.push(repoEnvPath);
}
loadEnvFiles({ files: envFiles, cwd: process.cwd(), assignToProcess: true, override: false });

process.exitCode = await runCli(process.argv.slice(2));
