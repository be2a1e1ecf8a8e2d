import { FileRecord } from './types.js';

export interface DuplicateGroup {
  digest: string;
  canonical: FileRecord;
  duplicates: FileRecord[];
}

function compareStrings(left: string, right: string): number {
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

/**
 * Total order used to pick the file kept from a duplicate group:
 * earliest modification time, then file name, then full path.
 */
export function compareCanonicalOrder(left: FileRecord, right: FileRecord): number {
  if (left.mtimeMs !== right.mtimeMs) {
    return left.mtimeMs - right.mtimeMs;
  }

  const byName = compareStrings(left.name, right.name);
  if (byName !== 0) {
    return byName;
  }

  return compareStrings(left.path, right.path);
}

/**
 * Group hashed records by digest and mark every non-canonical member.
 * Records without a digest are ignored.
 */
export function resolveDuplicates(records: FileRecord[]): DuplicateGroup[] {
  const byDigest = new Map<string, FileRecord[]>();

  for (const record of records) {
    if (!record.digest) continue;
    const group = byDigest.get(record.digest) ?? [];
    group.push(record);
    byDigest.set(record.digest, group);
  }

  const groups: DuplicateGroup[] = [];

  for (const [digest, members] of byDigest.entries()) {
    if (members.length < 2) continue;

    const [canonical, ...duplicates] = [...members].sort(compareCanonicalOrder);
    for (const duplicate of duplicates) {
      duplicate.duplicateOf = canonical.path;
    }
    groups.push({ digest, canonical, duplicates });
  }

  return groups.sort((left, right) => compareCanonicalOrder(left.canonical, right.canonical));
}
