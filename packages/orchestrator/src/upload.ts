import { ValidationError } from '@spatial-audio/contracts';

/**
 * Reject content that must never reach the orchestrator: empty uploads and,
 * when a limit is given, uploads larger than it.
 */
export function validateUpload(byteLength: number, maxUploadBytes?: number): void {
  if (byteLength === 0) {
    throw new ValidationError('Uploaded file is empty', 'empty_file');
  }
  if (maxUploadBytes !== undefined && byteLength > maxUploadBytes) {
    throw new ValidationError(
      `Upload is ${byteLength} bytes, over the ${maxUploadBytes} byte limit`,
      'payload_too_large',
    );
  }
}
