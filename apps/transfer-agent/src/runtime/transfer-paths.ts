const SCHEME_PATTERN = /^[a-zA-Z][a-zA-Z\d+.-]*:/;
const FORBIDDEN_CHARACTERS = /[\\?#%\u0000-\u001f<>"|*]/;

export function isAbsoluteUrl(value: string): boolean {
  if (value.trim().length === 0 || value !== value.trim()) {
    return false;
  }

  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * A relative path made of non-empty segments other than `.` and `..`.
 * Leading and trailing slashes are allowed; doubled slashes are not.
 */
export function isWellFormedRelativePath(value: string): boolean {
  if (value.trim().length === 0 || value !== value.trim()) {
    return false;
  }
  if (SCHEME_PATTERN.test(value) || FORBIDDEN_CHARACTERS.test(value) || value.startsWith('//')) {
    return false;
  }

  const segments = value.replace(/^\//, '').replace(/\/$/, '').split('/');
  return segments.every((segment) => segment.length > 0 && segment !== '.' && segment !== '..');
}

/** Returns the path with a single leading slash and no trailing slash. */
export function normalizeLocalPath(value: string): string {
  let path = value;
  if (path.endsWith('/')) {
    path = path.slice(0, -1);
  }
  if (!path.startsWith('/')) {
    path = `/${path}`;
  }
  return path;
}
