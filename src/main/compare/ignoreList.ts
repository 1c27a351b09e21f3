import path from 'path';

/**
 * System locations a backup comparison never descends into. Matched as
 * case-insensitive substrings of the absolute entry path.
 */
export const DEFAULT_IGNORE_PATTERNS: readonly string[] = [
  'C:\\Windows',
  'C:\\Program Files',
  'C:\\Program Files (x86)',
  'C:\\ProgramData',
  '$Recycle.Bin',
  'System Volume Information',
  'pagefile.sys',
  'hiberfil.sys',
  'swapfile.sys',
];

export type IgnoreMatcher = (absolutePath: string) => boolean;

const endsBeyond = (haystack: string, needle: string, offset: number) => {
  for (let index = haystack.indexOf(needle); index !== -1; index = haystack.indexOf(needle, index + 1)) {
    if (index + needle.length > offset) {
      return true;
    }
  }
  return false;
};

/**
 * With `rootPath`, a pattern only counts when the match reaches past the root,
 * so the root's own name never prunes the walk.
 */
export const createIgnoreMatcher = (patterns: readonly string[], rootPath = ''): IgnoreMatcher => {
  const lowered = patterns
    .map((pattern) => pattern.trim().toLowerCase())
    .filter(Boolean);

  if (lowered.length === 0) {
    return () => false;
  }

  return (absolutePath) => {
    const lowerPath = absolutePath.toLowerCase();
    return lowered.some((pattern) => endsBeyond(lowerPath, pattern, rootPath.length));
  };
};

/** Relative path with forward slashes, so both roots produce the same key. */
export const normaliseRelativePath = (rootPath: string, entryPath: string) => {
  const relative = path.relative(rootPath, entryPath);
  return relative.split(path.sep).filter(Boolean).join('/') || '';
};

export const parentRelativePath = (relativePath: string) => {
  const index = relativePath.lastIndexOf('/');
  return index === -1 ? '' : relativePath.slice(0, index);
};

export const lastSegment = (relativePath: string) =>
  relativePath.slice(relativePath.lastIndexOf('/') + 1);
