/**
 * Naming-convention helpers for relationship inference.
 * Key-like field names (`customer_id`, `customerId`) are reduced to a prefix
 * that is compared against container names, singular/plural-insensitively.
 */

const KNOWN_FILE_EXTENSIONS = /\.(csv|tsv|txt|xlsx|xls|json)$/i;

/**
 * Strip the key suffix from a field name.
 * `customer_id` and `customerid` both give `customer`; `id` alone gives null.
 */
export function extractKeyPrefix(fieldName: string): string | null {
  const lower = fieldName.trim().toLowerCase();

  let prefix: string;
  if (lower.endsWith('_id') && lower.length > 3) {
    prefix = lower.slice(0, -3);
  } else if (lower.endsWith('id') && lower.length > 2) {
    prefix = lower.slice(0, -2);
  } else {
    return null;
  }

  prefix = prefix.replace(/[_\-\s.]+$/, '');
  return prefix.length > 0 ? prefix : null;
}

/** Lowercase and drop separators, so `Customer_ID` and `customerid` compare equal. */
export function compactName(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9]/g, '');
}

export function pluralize(word: string): string {
  const lower = word.toLowerCase();

  if (lower.endsWith('ss')) return lower + 'es';
  if (lower.endsWith('s')) return lower;

  if (lower.endsWith('y') && lower.length > 1 && !/[aeiou]/.test(lower[lower.length - 2])) {
    return lower.slice(0, -1) + 'ies';
  }

  if (/(x|z|sh|ch)$/.test(lower)) return lower + 'es';

  return lower + 's';
}

export function singularize(word: string): string {
  const lower = word.toLowerCase();

  if (lower.endsWith('ies') && lower.length > 3) return lower.slice(0, -3) + 'y';
  if (/(sses|xes|zes|shes|ches)$/.test(lower)) return lower.slice(0, -2);
  if (lower.endsWith('s') && !lower.endsWith('ss') && lower.length > 1) {
    return lower.slice(0, -1);
  }

  return lower;
}

/**
 * The comparable part of a container name: last path segment, no query
 * string, no file extension, lowercase.
 * `/api/v1/Departments?page=2` → `departments`, `employees.csv` → `employees`.
 */
export function containerStem(containerName: string): string {
  const withoutQuery = containerName.split('?')[0];
  const segments = withoutQuery.split(/[/\\]/).filter((s) => s.length > 0);
  const last = segments.length > 0 ? segments[segments.length - 1] : withoutQuery;
  return last.replace(KNOWN_FILE_EXTENSIONS, '').toLowerCase();
}

/** True when the container is named after the prefix, in either number. */
export function containerMatchesPrefix(containerName: string, prefix: string): boolean {
  const stem = containerStem(containerName);
  const target = prefix.toLowerCase();

  return (
    stem === target ||
    stem === pluralize(target) ||
    singularize(stem) === target ||
    singularize(stem) === singularize(target)
  );
}

/** Levenshtein distance. */
export function editDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);

  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const substitution = previous[j - 1] + (a[i - 1] === b[j - 1] ? 0 : 1);
      current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, substitution);
    }
    previous = current;
  }

  return previous[b.length];
}

/**
 * Whether a field of a file or API container reads as that container's key:
 * `id`, or `department_id` inside `departments.csv`.
 */
export function looksLikePrimaryKey(fieldName: string, containerName: string): boolean {
  const name = compactName(fieldName);
  if (name === 'id') return true;
  return name === compactName(singularize(containerStem(containerName))) + 'id';
}
