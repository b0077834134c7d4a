export interface DiffFile {
  path: string;
  changeType: 'added' | 'modified' | 'deleted' | 'renamed';
  additions: number;
  deletions: number;
  oldPath?: string;
}

export interface DiffSummary {
  additions: number;
  deletions: number;
  filesChanged: number;
}

export interface DiffResult {
  files: DiffFile[];
  summary: DiffSummary;
  raw: string;
}

export interface StatusEntry {
  path: string;
  /** Two-letter porcelain code, e.g. ` M`, `A `, `??`. */
  code: string;
  oldPath?: string;
}

export interface StatusResult {
  branch: string | null;
  clean: boolean;
  entries: StatusEntry[];
}

export interface LogEntry {
  hash: string;
  author: string;
  date: string;
  subject: string;
}

/** Field and record separators for `git log --format`, see `LOG_FORMAT`. */
const FS = '\x1f';
const RS = '\x1e';
export const LOG_FORMAT = `%H${FS}%an${FS}%aI${FS}%s${RS}`;

/**
 * Structured diff from the three views git gives of the same range:
 * `git diff`, `git diff --name-status` and `git diff --numstat`.
 */
export function parseDiff(input: { rawDiff: string; nameStatus: string; numStat: string }): DiffResult {
  const counts = parseNumStat(input.numStat);
  const changes = parseNameStatus(input.nameStatus);

  const paths = [...new Set([...counts.keys(), ...changes.keys()])].sort();
  const files = paths.map((path): DiffFile => {
    const c = counts.get(path) ?? { additions: 0, deletions: 0 };
    const ch = changes.get(path) ?? { changeType: 'modified' as const };
    const file: DiffFile = { path, changeType: ch.changeType, additions: c.additions, deletions: c.deletions };
    if (ch.oldPath) file.oldPath = ch.oldPath;
    return file;
  });

  return {
    files,
    summary: {
      additions: files.reduce((n, f) => n + f.additions, 0),
      deletions: files.reduce((n, f) => n + f.deletions, 0),
      filesChanged: files.length
    },
    raw: input.rawDiff
  };
}

/** `git status --porcelain=v1 --branch` output. */
export function parseStatus(out: string): StatusResult {
  let branch: string | null = null;
  const entries: StatusEntry[] = [];

  for (const line of out.split('\n')) {
    if (!line.trim()) continue;
    if (line.startsWith('## ')) {
      branch = parseBranchLine(line.slice(3));
      continue;
    }
    if (line.length < 4) continue;
    const code = line.slice(0, 2);
    const rest = line.slice(3).trim();
    const arrow = rest.indexOf(' -> ');
    if (arrow >= 0) {
      entries.push({ code, oldPath: rest.slice(0, arrow), path: rest.slice(arrow + 4) });
    } else {
      entries.push({ code, path: rest });
    }
  }

  return { branch, clean: entries.length === 0, entries };
}

export function parseLog(out: string): LogEntry[] {
  return out
    .split(RS)
    .map((rec) => rec.trim())
    .filter(Boolean)
    .map((rec) => {
      const [hash = '', author = '', date = '', subject = ''] = rec.split(FS);
      return { hash, author, date, subject };
    });
}

function parseBranchLine(s: string): string | null {
  // "main...origin/main [ahead 1]", "No commits yet on main", "HEAD (no branch)"
  if (s.startsWith('No commits yet on ')) return s.slice('No commits yet on '.length).trim();
  if (s.startsWith('HEAD (no branch)')) return null;
  const name = s.split('...')[0].split(' ')[0];
  return name || null;
}

function parseNumStat(numStat: string): Map<string, { additions: number; deletions: number }> {
  const out = new Map<string, { additions: number; deletions: number }>();
  for (const line of numStat.split('\n')) {
    const parts = line.split('\t');
    if (parts.length < 3) continue;
    const [adds, dels, rawPath] = parts;
    const path = renamedTarget(rawPath.trim());
    if (!path) continue;
    // Binary files report '-' for both counts.
    out.set(path, { additions: adds === '-' ? 0 : toInt(adds), deletions: dels === '-' ? 0 : toInt(dels) });
  }
  return out;
}

function parseNameStatus(nameStatus: string): Map<string, { changeType: DiffFile['changeType']; oldPath?: string }> {
  const out = new Map<string, { changeType: DiffFile['changeType']; oldPath?: string }>();
  for (const line of nameStatus.split('\n')) {
    const parts = line.split('\t').map((p) => p.trim());
    if (parts.length < 2 || !parts[0]) continue;
    const status = parts[0];
    if (status.startsWith('R') && parts.length >= 3) {
      out.set(parts[2], { changeType: 'renamed', oldPath: parts[1] });
      continue;
    }
    const changeType = status === 'A' ? 'added' : status === 'D' ? 'deleted' : 'modified';
    out.set(parts[1], { changeType });
  }
  return out;
}

// numstat writes renames as "old => new" or "dir/{old => new}/file".
function renamedTarget(path: string): string {
  const braced = /^(.*)\{(.*) => (.*)\}(.*)$/.exec(path);
  if (braced) return `${braced[1]}${braced[3]}${braced[4]}`.replace(/\/\//g, '/');
  const arrow = path.indexOf(' => ');
  return arrow >= 0 ? path.slice(arrow + 4) : path;
}

function toInt(s: string): number {
  const n = Number.parseInt(s, 10);
  return Number.isFinite(n) ? n : 0;
}
