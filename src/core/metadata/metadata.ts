/**
 * Frontmatter metadata of a recipe or menu document.
 */

/** A loosely typed YAML value. */
export type YamlValue =
  | string
  | number
  | boolean
  | null
  | YamlValue[]
  | { [key: string]: YamlValue };

export type MetadataMap = Record<string, YamlValue>;

const IMAGE_KEYS = ['image', 'images', 'picture', 'pictures'] as const;
const TAG_KEYS = ['tags', 'tag'] as const;

/**
 * Immutable key/value view over a document's frontmatter, with typed
 * accessors for the common fields. Custom fields are reachable through `get`.
 */
export class Metadata {
  private readonly data: Readonly<MetadataMap>;

  constructor(data: MetadataMap = {}) {
    this.data = deepFreeze(structuredClone(data));
  }

  static empty(): Metadata {
    return new Metadata();
  }

  /** Raw value of any metadata key. */
  get(key: string): YamlValue | undefined {
    return Object.hasOwn(this.data, key) ? this.data[key] : undefined;
  }

  has(key: string): boolean {
    return Object.hasOwn(this.data, key);
  }

  keys(): string[] {
    return Object.keys(this.data);
  }

  get isEmpty(): boolean {
    return this.keys().length === 0;
  }

  get title(): string | undefined {
    const value = this.get('title');
    return typeof value === 'string' ? value : undefined;
  }

  get servings(): number | undefined {
    const value = this.get('servings');
    return typeof value === 'number' && Number.isInteger(value) ? value : undefined;
  }

  /**
   * Tags from `tags`, falling back to `tag`.
   * A string is split on commas; a list keeps its string items.
   * A key holding any other kind of value is skipped.
   */
  get tags(): string[] {
    for (const key of TAG_KEYS) {
      const value = this.get(key);
      if (typeof value === 'string') {
        return value
          .split(',')
          .map((tag) => tag.trim())
          .filter((tag) => tag.length > 0);
      }
      if (Array.isArray(value)) {
        return value.filter((tag): tag is string => typeof tag === 'string');
      }
    }
    return [];
  }

  /**
   * First image reference among `image`, `images`, `picture`, `pictures`.
   * For a list only its first element is considered.
   */
  get imageUrl(): string | undefined {
    for (const key of IMAGE_KEYS) {
      const value = this.get(key);
      if (typeof value === 'string') {
        return value;
      }
      if (Array.isArray(value) && typeof value[0] === 'string') {
        return value[0];
      }
    }
    return undefined;
  }

  /** Mutable deep copy of the underlying map. */
  toJSON(): MetadataMap {
    return structuredClone(this.data);
  }

  clone(): Metadata {
    return new Metadata(this.toJSON());
  }
}

/**
 * Narrow an arbitrary parsed YAML document to a metadata map.
 * Only plain mappings qualify; scalars and lists do not.
 */
export function isMetadataMap(value: unknown): value is MetadataMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
