const SNAPSHOT_NAME = /^(\d{4})(\d{2})(\d{2})_(\d{2})(\d{2})(\d{2})$/;

export function formatSnapshotTimestamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 4)}${iso.slice(5, 7)}${iso.slice(8, 10)}_${iso.slice(11, 13)}${iso.slice(14, 16)}${
    iso.slice(17, 19)
  }`;
}

export function parseSnapshotTimestamp(name: string): Date | null {
  const match = name.match(SNAPSHOT_NAME);
  if (!match) return null;
  const [, year, month, day, hour, minute, second] = match;
  const date = new Date(`${year}-${month}-${day}T${hour}:${minute}:${second}Z`);
  if (Number.isNaN(date.getTime()) || formatSnapshotTimestamp(date) !== name) {
    return null;
  }
  return date;
}

export function isSnapshotName(name: string): boolean {
  return parseSnapshotTimestamp(name) !== null;
}

/**
 * Picks the name for a new run. Names sort lexically in time order, so a
 * clock that has not moved past the newest existing snapshot yields the
 * newest name plus one second.
 */
export function nextSnapshotName(existing: Iterable<string>, now: Date): string {
  const candidate = formatSnapshotTimestamp(now);
  let newest: string | null = null;
  for (const name of existing) {
    if (!isSnapshotName(name)) continue;
    if (newest === null || name > newest) newest = name;
  }

  if (newest === null || candidate > newest) {
    return candidate;
  }

  const newestDate = parseSnapshotTimestamp(newest);
  if (!newestDate) return candidate;
  return formatSnapshotTimestamp(new Date(newestDate.getTime() + 1000));
}
