/**
 * Where a recipe entry's text comes from.
 */

export interface PathSource {
  readonly kind: 'path';
  readonly path: string;
}

export interface ContentSource {
  readonly kind: 'content';
  readonly content: string;
  readonly name?: string;
}

export type RecipeSource = PathSource | ContentSource;

export function pathSource(path: string): PathSource {
  return Object.freeze({ kind: 'path', path });
}

export function contentSource(content: string, name?: string): ContentSource {
  return Object.freeze(name === undefined ? { kind: 'content', content } : { kind: 'content', content, name });
}

export function cloneSource(source: RecipeSource): RecipeSource {
  switch (source.kind) {
    case 'path':
      return pathSource(source.path);
    case 'content':
      return contentSource(source.content, source.name);
  }
}
