import { readdir, readFile, stat } from 'node:fs/promises';
import { readFileSync } from 'node:fs';
import { createRequire } from 'node:module';
import { join, extname, relative, sep } from 'node:path';
import { z } from 'zod';

/** The slice of the `ignore` matcher used here. */
interface GitignoreMatcher {
  add(patterns: string[]): GitignoreMatcher;
  ignores(pathname: string): boolean;
}

// CommonJS factory export
const ignore: () => GitignoreMatcher = createRequire(import.meta.url)('ignore');

export interface FileEntry {
  /** Relative to the project root, POSIX separators. */
  path: string;
  absolutePath: string;
  contents: string;
  language: string;
}

export const MAX_FILE_SIZE = 1_048_576; // 1 MB

const languageTableSchema = z.object({
  extensions: z.record(z.string()),
  skipDirs: z.array(z.string()),
  ignoredSuffixes: z.array(z.string()),
});

const LANGUAGE_TABLE = languageTableSchema.parse(
  JSON.parse(readFileSync(new URL('../../data/languages.json', import.meta.url), 'utf8')),
);

const EXT_TO_LANGUAGE: Record<string, string> = LANGUAGE_TABLE.extensions;
const SKIP_DIRS = new Set(LANGUAGE_TABLE.skipDirs);
const TEXT_EXTENSIONS = new Set(Object.keys(EXT_TO_LANGUAGE));

export function getLanguage(filePath: string): string {
  return EXT_TO_LANGUAGE[extname(filePath).toLowerCase()] ?? 'text';
}

export function toPosix(path: string): string {
  return sep === '/' ? path : path.split(sep).join('/');
}

/**
 * Detects if a buffer is likely binary by sampling bytes.
 * Returns true if >5% of sampled bytes are non-printable non-whitespace.
 */
export function isBinary(buf: Buffer): boolean {
  const sampleSize = Math.min(buf.length, 8000);
  if (sampleSize === 0) return false;
  let nonPrintable = 0;
  for (let i = 0; i < sampleSize; i++) {
    const b = buf[i];
    if (b === undefined) continue;
    // Null byte is a strong binary indicator
    if (b === 0) return true;
    if (b < 9 || (b > 13 && b < 32 && b !== 27)) nonPrintable++;
  }
  return nonPrintable / sampleSize > 0.05;
}

/** `.gitignore` rules of one project root, matched with the `ignore` package. */
export class IgnoreRules {
  private readonly matcher: GitignoreMatcher;

  constructor(lines: string[]) {
    this.matcher = ignore().add(lines);
  }

  static empty(): IgnoreRules {
    return new IgnoreRules([]);
  }

  /** True when `relPath` (or, for files, any of its parent directories) is ignored. */
  ignores(relPath: string, isDirectory = false): boolean {
    if (relPath === '') return false;
    return this.matcher.ignores(isDirectory ? `${relPath}/` : relPath);
  }
}

export class FileIndexer {
  /** Reads `<root>/.gitignore`; a missing file means no extra rules. */
  async loadIgnoreRules(root: string): Promise<IgnoreRules> {
    let raw: string;
    try {
      raw = (await readFile(join(root, '.gitignore'))).toString('utf8');
    } catch {
      return IgnoreRules.empty();
    }
    return new IgnoreRules(raw.split(/\r?\n/));
  }

  /**
   * Path-level exclusions shared by the indexer and the watcher: noise and
   * hidden directories, non-text extensions and `.gitignore` matches.
   */
  isExcluded(relPath: string, rules: IgnoreRules, isDirectory = false): boolean {
    const segments = relPath.split('/');
    const dirs = isDirectory ? segments : segments.slice(0, -1);
    if (dirs.some((d) => SKIP_DIRS.has(d) || d.startsWith('.'))) return true;
    if (!isDirectory) {
      const name = segments[segments.length - 1] ?? '';
      if (!TEXT_EXTENSIONS.has(extname(name).toLowerCase())) return true;
      if (LANGUAGE_TABLE.ignoredSuffixes.some((s) => name.endsWith(s))) return true;
    }
    return rules.ignores(relPath, isDirectory);
  }

  /**
   * Walk a project recursively, yielding relative paths of indexable files.
   * Contents are not read; size and binary checks happen in readFile().
   */
  async *walkDirectory(root: string, rules?: IgnoreRules, dirPath: string = root): AsyncGenerator<string> {
    const ignore = rules ?? (await this.loadIgnoreRules(root));
    let entries;
    try {
      entries = await readdir(dirPath, { withFileTypes: true });
    } catch {
      return; // permission error or not a directory
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const fullPath = join(dirPath, entry.name);
      const relPath = toPosix(relative(root, fullPath));

      if (entry.isDirectory()) {
        if (!this.isExcluded(relPath, ignore, true)) {
          yield* this.walkDirectory(root, ignore, fullPath);
        }
        continue;
      }

      if (!entry.isFile()) continue;
      if (this.isExcluded(relPath, ignore)) continue;
      yield relPath;
    }
  }

  /**
   * Read a single project file, returning null when it is missing, too large
   * or binary.
   */
  async readFile(root: string, relPath: string): Promise<FileEntry | null> {
    const absolutePath = join(root, relPath);
    try {
      const info = await stat(absolutePath);
      if (!info.isFile() || info.size > MAX_FILE_SIZE) return null;

      const raw = await readFile(absolutePath);
      if (isBinary(raw)) return null;

      return {
        path: relPath,
        absolutePath,
        contents: raw.toString('utf8'),
        language: getLanguage(relPath),
      };
    } catch {
      return null;
    }
  }
}
