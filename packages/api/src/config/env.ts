// packages/api/src/config/env.ts
// Environment-based configuration for the HTTP service.
// Pipeline settings come from the orchestrator loader, so the CLI and the API read the same keys.
import { ConfigurationError } from '@spatial-audio/contracts';
import { loadPipelineConfig, type PipelineConfig } from '@spatial-audio/orchestrator';
import { readInt, readString } from '@spatial-audio/shared-infrastructure';

export type NodeEnv = 'development' | 'test' | 'production';

const NODE_ENVS: readonly NodeEnv[] = ['development', 'test', 'production'];

export interface ApiConfig {
  nodeEnv: NodeEnv;
  httpPort: number;
  httpHost: string;
  pipeline: PipelineConfig;
}

function parseNodeEnv(value: string | undefined): NodeEnv {
  return NODE_ENVS.find((env) => env === value) ?? 'development';
}

export function loadConfig(): ApiConfig {
  const httpPort = readInt('HTTP_PORT', 8080);
  if (httpPort <= 0 || httpPort > 65_535) {
    throw new ConfigurationError(`HTTP_PORT must be between 1 and 65535, got ${httpPort}`);
  }

  return {
    nodeEnv: parseNodeEnv(readString('NODE_ENV')),
    httpPort,
    httpHost: readString('HTTP_HOST', '0.0.0.0') ?? '0.0.0.0',
    pipeline: loadPipelineConfig(),
  };
}
