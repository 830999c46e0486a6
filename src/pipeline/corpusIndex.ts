import type {
  CorpusIndex,
  FailurePattern,
  TrialRecord,
} from "../types.js";

/**
 * Builds the in-memory lookup structures over the historical corpus.
 *
 * Records are deduplicated by identifier (last write wins, first position
 * kept) and every dimension maps a normalized key to record positions in
 * corpus order. Blank keys are skipped on their dimension only, so a record
 * without an identifier is still reachable through its other fields.
 *
 * The result is frozen: it is shared read-only state for concurrent callers,
 * and a reload builds a fresh index rather than mutating this one.
 */
export function buildCorpusIndex(
  records: readonly TrialRecord[],
  failurePatterns: Record<string, FailurePattern> = {}
): CorpusIndex {
  const deduped: Readonly<TrialRecord>[] = [];
  const byId = new Map<string, number>();

  for (const record of records) {
    const id = record.nctId.trim();
    const existing = id ? byId.get(id) : undefined;
    const snapshot = freezeRecord(record);

    if (existing !== undefined) {
      deduped[existing] = snapshot;
      continue;
    }
    if (id) byId.set(id, deduped.length);
    deduped.push(snapshot);
  }

  const byDrugClass = new Map<string, number[]>();
  const byTherapeuticArea = new Map<string, number[]>();
  const byPhase = new Map<string, number[]>();
  const byOutcome = new Map<string, number[]>();
  const byTag = new Map<string, number[]>();

  deduped.forEach((record, position) => {
    addToBucket(byDrugClass, normalizeKey(record.drugClass), position);
    addToBucket(byTherapeuticArea, normalizeKey(record.therapeuticArea), position);
    addToBucket(byPhase, record.phase ?? "", position);
    addToBucket(byOutcome, normalizeKey(record.outcome), position);
    for (const tag of new Set(record.tags.map(normalizeKey))) {
      addToBucket(byTag, tag, position);
    }
  });

  return Object.freeze({
    records: Object.freeze(deduped),
    byId,
    byDrugClass: freezeBuckets(byDrugClass),
    byTherapeuticArea: freezeBuckets(byTherapeuticArea),
    byPhase: freezeBuckets(byPhase),
    byOutcome: freezeBuckets(byOutcome),
    byTag: freezeBuckets(byTag),
    failurePatterns: Object.freeze(
      Object.fromEntries(
        Object.entries(failurePatterns).map(([key, pattern]) => [
          key,
          deepFreeze(structuredClone(pattern)),
        ])
      )
    ),
  });
}

/** Lower-cased, trimmed form used for every case-insensitive dimension. */
export function normalizeKey(value: string | undefined): string {
  return (value ?? "").trim().toLowerCase();
}

export function getTrialById(
  index: CorpusIndex,
  nctId: string
): Readonly<TrialRecord> | undefined {
  const position = index.byId.get(nctId.trim());
  return position === undefined ? undefined : index.records[position];
}

export function recordsAt(
  index: CorpusIndex,
  positions: Iterable<number>
): Readonly<TrialRecord>[] {
  return [...positions]
    .sort((a, b) => a - b)
    .map((p) => index.records[p])
    .filter((r): r is Readonly<TrialRecord> => r !== undefined);
}

function addToBucket(
  buckets: Map<string, number[]>,
  key: string,
  position: number
): void {
  if (!key) return;
  const bucket = buckets.get(key);
  if (bucket) bucket.push(position);
  else buckets.set(key, [position]);
}

function freezeBuckets(
  buckets: Map<string, number[]>
): ReadonlyMap<string, readonly number[]> {
  for (const bucket of buckets.values()) Object.freeze(bucket);
  return buckets;
}

// Lists are copied then frozen in place: search results spread records
// shallowly and share these arrays with the index.
function freezeRecord(record: TrialRecord): Readonly<TrialRecord> {
  return Object.freeze({
    ...record,
    tags: frozenCopy(record.tags),
    keyLearnings: frozenCopy(record.keyLearnings),
    failureReasons: record.failureReasons ? frozenCopy(record.failureReasons) : undefined,
  });
}

function frozenCopy(values: readonly string[]): string[] {
  const copy = [...values];
  Object.freeze(copy);
  return copy;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
