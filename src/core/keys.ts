/**
 * Storage key derivation.
 */

const SEPARATORS = /[ /\\]/g;

function clean(value: string): string {
  return value.replace(SEPARATORS, "_").toLowerCase();
}

const LEADING_DATE = /^\d{4}-\d{2}-\d{2}/;

/**
 * Leading calendar date of an ISO timestamp ("2024-03-01T10:00:00" →
 * "2024-03-01"). Anything without one yields "", which no date window
 * contains.
 */
export function datePrefix(timestamp: string): string {
  return LEADING_DATE.exec(timestamp)?.[0] ?? "";
}

/**
 * `{company}/{date}/{category}/{filename}` with company and filename
 * lower-cased and spaces/path separators replaced by underscores.
 */
export function formatKey(
  companyName: string,
  date: string,
  category: string,
  filename: string,
): string {
  return `${clean(companyName)}/${datePrefix(date)}/${category}/${clean(filename)}`;
}

/** Title as used in synthesized filenames: lower-cased, spaces → "_". */
export function titleSlug(title: string): string {
  return title.toLowerCase().replace(/ /g, "_");
}

export function storageUrl(bucket: string, key: string, scheme = "s3"): string {
  return `${scheme}://${bucket}/${key}`;
}
