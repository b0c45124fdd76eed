/**
 * Generic ordered property tree.
 *
 * Every node holds a string value and an ordered list of keyed children.
 * Keys may repeat; array elements are children with the empty key.
 *
 * @module tree/property-tree
 */

import jsonc, { type ParseErrorCode, type ParseOptions } from 'jsonc-parser';
import type { z } from 'zod';
import { TreeCoercionError, TreePathError } from '../errors/index.js';

/** Key given to array elements. */
export const ARRAY_ELEMENT_KEY = '';

/** Separator between segments of a tree path. */
export const PATH_SEPARATOR = '.';

const STRICT_JSON: ParseOptions = {
  disallowComments: true,
  allowTrailingComma: false,
  allowEmptyContent: false,
};

/**
 * A keyed child of a tree node.
 */
export type TreeEntry = readonly [key: string, child: PropertyTree];

/**
 * JSON shape produced by {@link PropertyTree.toJSON}.
 */
export type TreeJson = string | TreeJson[] | { [key: string]: TreeJson };

/**
 * Ordered key/value tree decoded from JSON.
 *
 * @example
 * ```typescript
 * const tree = PropertyTree.fromJson('{"user":{"id":7,"tags":["a","b"]}}');
 * tree.get('user.id');                           // "7"
 * tree.getAs('user.id', TreeValue.integer);      // 7
 * tree.getChild('user.tags').size;               // 2
 * ```
 */
export class PropertyTree implements Iterable<TreeEntry> {
  private data: string;
  private readonly children: Array<[string, PropertyTree]> = [];

  constructor(value = '') {
    this.data = value;
  }

  /**
   * Decodes JSON text into a tree.
   *
   * The tree is built from the parser's event stream, so object members keep
   * document order (integer-like keys included) and repeated keys each become
   * a child. Arrays become children keyed `""`, and scalars become text values
   * (`1` -> `"1"`, `true` -> `"true"`, `null` -> `"null"`). Comments and
   * trailing commas are rejected.
   *
   * @throws {SyntaxError} If the text is not valid JSON.
   */
  static fromJson(text: string): PropertyTree {
    const root = new PropertyTree();
    const open: PropertyTree[] = [];
    let pendingKey: string | undefined;
    const errors: Array<{ code: ParseErrorCode; offset: number }> = [];

    const place = (): PropertyTree => {
      const parent = open[open.length - 1];
      const node = parent ? parent.addChild(pendingKey ?? ARRAY_ELEMENT_KEY, new PropertyTree()) : root;
      pendingKey = undefined;
      return node;
    };

    jsonc.visit(
      text,
      {
        onObjectBegin: () => {
          open.push(place());
        },
        onArrayBegin: () => {
          open.push(place());
        },
        onObjectEnd: () => {
          open.pop();
        },
        onArrayEnd: () => {
          open.pop();
        },
        onObjectProperty: (property) => {
          pendingKey = property;
        },
        onLiteralValue: (value: unknown) => {
          place().data = String(value);
        },
        onError: (code, offset) => {
          errors.push({ code, offset });
        },
      },
      STRICT_JSON
    );

    const failure = errors[0];
    if (failure) {
      throw new SyntaxError(`${jsonc.printParseErrorCode(failure.code)} at offset ${failure.offset}`);
    }
    return root;
  }

  /** The node's own value. Empty for objects and arrays. */
  get value(): string {
    return this.data;
  }

  set value(value: string) {
    this.data = value;
  }

  /** Number of direct children. */
  get size(): number {
    return this.children.length;
  }

  get isEmpty(): boolean {
    return this.children.length === 0;
  }

  [Symbol.iterator](): Iterator<TreeEntry> {
    return this.children[Symbol.iterator]();
  }

  /** Keys of the direct children, in order. */
  keys(): string[] {
    return this.children.map(([key]) => key);
  }

  /** Whether `name` is the key of a direct child. */
  hasChild(name: string): boolean {
    return this.children.some(([key]) => key === name);
  }

  /** The first direct child with key `name`. */
  child(name: string): PropertyTree | undefined {
    return this.children.find(([key]) => key === name)?.[1];
  }

  /**
   * Resolves a dot-separated path, first match at every level.
   */
  getChildOptional(path: string): PropertyTree | undefined {
    let node: PropertyTree | undefined = this;
    for (const segment of path.split(PATH_SEPARATOR)) {
      node = node.child(segment);
      if (!node) {
        return undefined;
      }
    }
    return node;
  }

  /**
   * @throws {TreePathError} If the path does not resolve.
   */
  getChild(path: string): PropertyTree {
    const node = this.getChildOptional(path);
    if (!node) {
      throw new TreePathError(path);
    }
    return node;
  }

  /**
   * The string value at `path`.
   * @throws {TreePathError} If the path does not resolve.
   */
  get(path: string): string {
    return this.getChild(path).value;
  }

  /**
   * The node's value converted with `coerce`.
   * @throws {TreeCoercionError} If the value does not convert.
   */
  getValue<S extends z.ZodTypeAny>(coerce: S): z.output<S> {
    const result = coerce.safeParse(this.data);
    if (!result.success) {
      throw new TreeCoercionError(this.data, result.error.issues[0]?.message ?? 'invalid value', {
        cause: result.error,
      });
    }
    return result.data;
  }

  /**
   * The value at `path` converted with `coerce`.
   * @throws {TreePathError} If the path does not resolve.
   * @throws {TreeCoercionError} If the value does not convert.
   */
  getAs<S extends z.ZodTypeAny>(path: string, coerce: S): z.output<S> {
    return this.getChild(path).getValue(coerce);
  }

  /**
   * Sets the value at `path`, creating missing nodes along the way. An
   * existing node is updated in place (first match at every level).
   * @returns The node at `path`.
   */
  put(path: string, value: string | number | boolean): PropertyTree {
    let node: PropertyTree = this;
    for (const segment of path.split(PATH_SEPARATOR)) {
      node = node.child(segment) ?? node.addChild(segment, new PropertyTree());
    }
    node.data = String(value);
    return node;
  }

  /**
   * Appends a child, even when one with the same key exists.
   * @returns The appended child.
   */
  addChild(key: string, child: PropertyTree): PropertyTree {
    this.children.push([key, child]);
    return child;
  }

  /**
   * Converts back to plain JSON: childless nodes become their string value, nodes
   * whose keys are all `""` become arrays, other nodes become objects (the
   * last of any repeated key wins).
   */
  toJSON(): TreeJson {
    if (this.children.length === 0) {
      return this.data;
    }
    if (this.children.every(([key]) => key === ARRAY_ELEMENT_KEY)) {
      return this.children.map(([, child]) => child.toJSON());
    }
    return Object.fromEntries(
      this.children.map(([key, child]): [string, TreeJson] => [key, child.toJSON()])
    );
  }
}
