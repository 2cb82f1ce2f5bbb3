import {
  AdapterError,
  ConfigurationError,
  MalformedResponseError,
  StorageError,
} from '@spatial-audio/contracts';

export type StageFailureKind = 'adapter' | 'malformed-response' | 'storage' | 'unexpected';

export type StageOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; kind: StageFailureKind; message: string; cause: unknown };

export function classifyFailure(error: unknown): StageFailureKind {
  if (error instanceof AdapterError || error instanceof ConfigurationError) return 'adapter';
  if (error instanceof MalformedResponseError) return 'malformed-response';
  if (error instanceof StorageError) return 'storage';
  return 'unexpected';
}

/**
 * Run a stage body and fold any thrown error into a tagged failure.
 */
export async function runStage<T>(body: () => Promise<T>): Promise<StageOutcome<T>> {
  try {
    return { ok: true, value: await body() };
  } catch (error: unknown) {
    return {
      ok: false,
      kind: classifyFailure(error),
      message: error instanceof Error ? error.message : String(error),
      cause: error,
    };
  }
}
