import { posix } from 'node:path';

import { unzipSync } from 'fflate';

import { MalformedResponseError } from '@spatial-audio/contracts';

export interface ExtractedStem {
  /** Base name of the archive member, e.g. `vocals.wav`. */
  name: string;
  bytes: Uint8Array;
}

function stemNameOf(memberPath: string): string {
  const base = posix.basename(memberPath.replaceAll('\\', '/'));
  const dot = base.lastIndexOf('.');
  return (dot > 0 ? base.slice(0, dot) : base).toLowerCase();
}

/**
 * Pull one stem out of a separation archive. The first file member whose base
 * name (without extension) matches `stemName` wins; directory entries are skipped.
 */
export function extractStem(archive: Uint8Array, stemName: string): ExtractedStem {
  const wanted = stemName.toLowerCase();
  let members: Record<string, Uint8Array>;
  try {
    members = unzipSync(archive, {
      filter: (file) => !file.name.endsWith('/') && stemNameOf(file.name) === wanted,
    });
  } catch (error: unknown) {
    throw new MalformedResponseError('Stem archive is not a readable zip file', { cause: error });
  }

  const [first] = Object.entries(members);
  if (!first) {
    throw new MalformedResponseError(`Stem archive has no "${stemName}" member`);
  }
  const [memberPath, bytes] = first;
  return { name: posix.basename(memberPath.replaceAll('\\', '/')), bytes };
}
