/**
 * File system operations - reading, probing and globbing.
 *
 * Recipe discovery uses the synchronous variants: it runs to completion on
 * the calling thread and the lazily computed entry fields cannot await.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import fg from 'fast-glob';

const READ_CHUNK_SIZE = 4096;

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Read a file synchronously.
 */
export function readFileSync(filePath: string): string {
  return fs.readFileSync(filePath, 'utf-8');
}

/**
 * Lazily yield the lines of a file, reading it in small chunks.
 * The file descriptor is closed when the consumer stops iterating,
 * so callers that only need the first few lines never read the rest.
 */
export function* readLinesSync(filePath: string): Generator<string, void, undefined> {
  const fd = fs.openSync(filePath, 'r');
  try {
    const buffer = Buffer.alloc(READ_CHUNK_SIZE);
    const decoder = new TextDecoder('utf-8');
    let pending = '';
    let bytesRead = fs.readSync(fd, buffer, 0, READ_CHUNK_SIZE, null);

    while (bytesRead > 0) {
      pending += decoder.decode(buffer.subarray(0, bytesRead), { stream: true });
      let newline = pending.indexOf('\n');
      while (newline !== -1) {
        yield stripCarriageReturn(pending.slice(0, newline));
        pending = pending.slice(newline + 1);
        newline = pending.indexOf('\n');
      }
      bytesRead = fs.readSync(fd, buffer, 0, READ_CHUNK_SIZE, null);
    }

    pending += decoder.decode();
    if (pending.length > 0) {
      yield stripCarriageReturn(pending);
    }
  } finally {
    fs.closeSync(fd);
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

/**
 * Check if a file exists (sync).
 */
export function fileExistsSync(filePath: string): boolean {
  return fs.existsSync(filePath);
}

/**
 * Check if a path exists and is a regular file.
 */
export function isFileSync(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}

/**
 * Check if a path exists and is a directory.
 */
export function isDirectorySync(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isDirectory();
  } catch {
    return false;
  }
}

/**
 * List the entry names of a directory, sorted by name.
 */
export function listDirectorySync(dirPath: string): string[] {
  return fs.readdirSync(dirPath).sort();
}

/**
 * Find files matching glob patterns, synchronously.
 * Patterns are evaluated relative to `cwd`, so the directory itself may
 * contain glob metacharacters.
 */
export function globFilesSync(
  patterns: string | string[],
  options: {
    cwd?: string;
    ignore?: string[];
    absolute?: boolean;
    /** Match names starting with a dot (default: false) */
    dot?: boolean;
  } = {}
): string[] {
  return fg.sync(patterns, {
    cwd: options.cwd || process.cwd(),
    ignore: options.ignore ?? [],
    absolute: options.absolute ?? true,
    dot: options.dot ?? false,
    onlyFiles: true,
  });
}

/**
 * Get the file name without its final extension.
 * Dotfiles such as `.cook` keep their full name, as `path.parse` does.
 */
export function fileStem(filePath: string): string {
  return path.parse(filePath).name;
}

/**
 * Get the final extension of a path without the leading dot.
 */
export function extensionOf(filePath: string): string | undefined {
  const ext = path.extname(filePath);
  return ext ? ext.slice(1) : undefined;
}

/**
 * Replace the final extension of a path.
 */
export function withExtension(filePath: string, extension: string): string {
  const parsed = path.parse(filePath);
  return path.join(parsed.dir, `${parsed.name}.${extension}`);
}

/**
 * Whether `child` lies inside `parent` (or is `parent` itself).
 */
export function isWithin(parent: string, child: string): boolean {
  const relative = path.relative(parent, child);
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}
