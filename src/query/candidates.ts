import type { IndexLookup, JobInput, StoreClient } from '../types.js';

/**
 * Runs each lookup in turn and unions the returned keys. The union is a coarse
 * narrowing step only; exact filtering happens in the job's map stage.
 *
 * `onIssued` fires once the store has accepted the first lookup, or at the end
 * when there were no lookups to issue.
 */
export async function collectCandidateKeys(
  client: StoreClient,
  lookups: readonly IndexLookup[],
  onIssued?: () => void,
): Promise<Set<string>> {
  const keys = new Set<string>();
  let issued = false;
  for (const lookup of lookups) {
    const entries = client.lookup(lookup);
    if (!issued) {
      issued = true;
      onIssued?.();
    }
    for await (const entry of entries) {
      keys.add(entry.key);
    }
  }
  if (!issued) onIssued?.();
  return keys;
}

/**
 * An empty candidate set widens to the whole bucket rather than an empty job.
 * This costs a full scan when the filters legitimately match nothing.
 */
export function toJobInput(bucket: string, keys: ReadonlySet<string>): JobInput {
  if (keys.size === 0) return { kind: 'bucket', bucket };
  return { kind: 'keys', bucket, keys: [...keys] };
}
