/**
 * Leading YAML frontmatter extraction.
 *
 * A document has frontmatter when its first line is `---`; the block runs
 * until the next `---` line. Anything malformed reads as "no metadata"
 * so that loading a document never fails on its header.
 */
import { tryParseYaml } from '../../utils/yaml.js';
import { Metadata, isMetadataMap } from './metadata.js';

export const FRONTMATTER_DELIMITER = '---';

/** Maximum number of lines a frontmatter block may span. */
export const MAX_FRONTMATTER_LINES = 30;

/**
 * Collect the raw frontmatter block (delimiters excluded).
 * Returns undefined when there is no first delimiter, no closing delimiter,
 * or the block grows past MAX_FRONTMATTER_LINES.
 *
 * Only as many lines as needed are pulled from the iterable.
 */
export function extractFrontmatter(lines: Iterable<string>): string | undefined {
  const iterator = lines[Symbol.iterator]();
  try {
    const first = iterator.next();
    if (first.done || first.value.trim() !== FRONTMATTER_DELIMITER) {
      return undefined;
    }

    const block: string[] = [];
    for (let next = iterator.next(); !next.done; next = iterator.next()) {
      if (next.value.trim() === FRONTMATTER_DELIMITER) {
        return block.join('\n');
      }
      block.push(next.value);
      if (block.length > MAX_FRONTMATTER_LINES) {
        return undefined;
      }
    }
    return undefined;
  } finally {
    iterator.return?.();
  }
}

/**
 * Parse a frontmatter block. Empty blocks, invalid YAML, documents that
 * are not a mapping and self-referencing documents yield undefined.
 */
export function parseFrontmatter(block: string): Metadata | undefined {
  if (block.trim().length === 0) {
    return undefined;
  }
  const parsed = tryParseYaml(block);
  return isMetadataMap(parsed) && isAcyclic(parsed) ? new Metadata(parsed) : undefined;
}

/**
 * Whether a parsed document is a tree. A self-referencing anchor
 * (`a: &x { b: *x }`) parses to an object that contains itself.
 */
function isAcyclic(value: unknown, ancestors = new Set<object>()): boolean {
  if (typeof value !== 'object' || value === null) {
    return true;
  }
  if (ancestors.has(value)) {
    return false;
  }
  ancestors.add(value);
  const acyclic = Object.values(value).every((child: unknown) => isAcyclic(child, ancestors));
  ancestors.delete(value);
  return acyclic;
}

/**
 * Extract and parse frontmatter in one step, falling back to empty metadata.
 */
export function extractMetadata(lines: Iterable<string>): Metadata {
  const block = extractFrontmatter(lines);
  return (block !== undefined ? parseFrontmatter(block) : undefined) ?? Metadata.empty();
}

/**
 * Metadata of an in-memory document.
 */
export function extractMetadataFromContent(content: string): Metadata {
  return extractMetadata(content.split(/\r?\n/));
}
