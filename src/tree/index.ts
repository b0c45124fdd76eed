/**
 * Property tree decoding and inspection.
 *
 * @module tree
 */

export {
  PropertyTree,
  ARRAY_ELEMENT_KEY,
  PATH_SEPARATOR,
  type TreeEntry,
  type TreeJson,
} from './property-tree.js';
export { TreeValue } from './coerce.js';
export { ptreeHasChild, checkDjangoError, ptreeVector } from './inspect.js';
