/**
 * Tests for checkDjangoError, ptreeVector and ptreeHasChild.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { TreeCoercionError } from '../errors/index.js';
import { InMemoryLogger, LogLevel } from '../observability/index.js';
import { TreeValue } from '../tree/coerce.js';
import { checkDjangoError, ptreeHasChild, ptreeVector } from '../tree/inspect.js';
import { PropertyTree } from '../tree/property-tree.js';

describe('checkDjangoError', () => {
  let logger: InMemoryLogger;

  beforeEach(() => {
    logger = new InMemoryLogger();
  });

  it('should report a missing tree', () => {
    expect(checkDjangoError(null, logger)).toBe(true);
    expect(checkDjangoError(undefined, logger)).toBe(true);
    expect(logger.messages(LogLevel.Error)).toEqual([
      'JSON Error: null property tree',
      'JSON Error: null property tree',
    ]);
  });

  it('should report a server exception with its traceback', () => {
    const tree = PropertyTree.fromJson('{"info":"boom","traceback":"line 1"}');

    expect(checkDjangoError(tree, logger)).toBe(true);
    expect(logger.messages(LogLevel.Error)).toEqual(['Django error: boom', '    traceback: line 1']);
  });

  it('should prefer info and traceback over djerror and error', () => {
    const tree = PropertyTree.fromJson('{"error":"e","djerror":"d","info":"i","traceback":"t"}');

    expect(checkDjangoError(tree, logger)).toBe(true);
    expect(logger.messages(LogLevel.Error)).toEqual(['Django error: i', '    traceback: t']);
  });

  it('should ignore info without a traceback', () => {
    const tree = PropertyTree.fromJson('{"info":"just info","djerror":"bad"}');

    expect(checkDjangoError(tree, logger)).toBe(true);
    expect(logger.messages(LogLevel.Error)).toEqual(['Django error: bad']);
  });

  it('should prefer djerror over error', () => {
    const tree = PropertyTree.fromJson('{"error":"e","djerror":"d"}');

    expect(checkDjangoError(tree, logger)).toBe(true);
    expect(logger.messages(LogLevel.Error)).toEqual(['Django error: d']);
  });

  it('should report a plain error', () => {
    const tree = PropertyTree.fromJson('{"error":"Status 500 when getting http://api.test/x"}');

    expect(checkDjangoError(tree, logger)).toBe(true);
    expect(logger.messages(LogLevel.Error)).toEqual(['HTTP Error: Status 500 when getting http://api.test/x']);
  });

  it('should pass a clean tree without logging', () => {
    const tree = PropertyTree.fromJson('{"data":{"error":"nested does not count"}}');

    expect(checkDjangoError(tree, logger)).toBe(false);
    expect(logger.entries).toEqual([]);
  });
});

describe('ptreeVector', () => {
  it('should append converted values in order', () => {
    const out = [0];

    const count = ptreeVector(PropertyTree.fromJson('[1,2,3]'), out, TreeValue.integer);

    expect(count).toBe(3);
    expect(out).toEqual([0, 1, 2, 3]);
  });

  it('should append nothing for an empty array', () => {
    const out: string[] = [];

    expect(ptreeVector(PropertyTree.fromJson('[]'), out, TreeValue.string)).toBe(0);
    expect(out).toEqual([]);
  });

  it('should leave the output untouched when a value fails', () => {
    const out: number[] = [9];

    expect(() => ptreeVector(PropertyTree.fromJson('[1,"x",3]'), out, TreeValue.integer)).toThrow(
      TreeCoercionError
    );
    expect(out).toEqual([9]);
  });

  it('should name the failing element', () => {
    try {
      ptreeVector(PropertyTree.fromJson('["1","2","2.5"]'), [], TreeValue.integer);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(TreeCoercionError);
      expect(error).toMatchObject({ details: { value: '2.5', key: '', index: 2 } });
    }
  });

  it('should read object members in document order', () => {
    const out: boolean[] = [];

    ptreeVector(PropertyTree.fromJson('{"b":true,"10":"0","2":false}'), out, TreeValue.boolean);

    expect(out).toEqual([true, false, false]);
  });
});

describe('ptreeHasChild', () => {
  it('should look at direct children only', () => {
    const tree = PropertyTree.fromJson('{"a":{"b":1}}');

    expect(ptreeHasChild(tree, 'a')).toBe(true);
    expect(ptreeHasChild(tree, 'b')).toBe(false);
    expect(ptreeHasChild(tree, 'a.b')).toBe(false);
  });
});
