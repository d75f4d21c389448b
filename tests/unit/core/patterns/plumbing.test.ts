import { describe, it, expect } from 'vitest';
import {
  bindResults,
  callThrough,
  delegateCall,
  errorReturn,
  indent,
  methodDeclaration,
  sortedMethods,
  successReturn,
} from '../../../../src/core/patterns/plumbing.js';
import { ZeroValueError } from '../../../../src/utils/errors.js';
import { CONTEXT, NULLABLE_ERROR, NUMBER, STRING, method, model, nullable, ref } from '../../../fixtures/models.js';

const getUser = method('getUser', { parameters: [CONTEXT, ref('GetUserRequest')], results: [nullable('User'), NULLABLE_ERROR] });
const saveUser = method('saveUser', { parameters: [CONTEXT, ref('User')], results: [NULLABLE_ERROR] });
const count = method('count', { parameters: [CONTEXT], results: [NUMBER] });
const touch = method('touch', { parameters: [CONTEXT] });

describe('methodDeclaration', () => {
  it('should render the signature with positional names', () => {
    expect(methodDeclaration(getUser)).toBe(
      'async getUser(ctx: Context, req: GetUserRequest): Promise<[User | null, Error | null]> {'
    );
  });

  it('should carry type parameters as declared', () => {
    const find = method('find', {
      parameters: [CONTEXT, STRING],
      results: [nullable('T')],
      typeParameters: [{ name: 'T', text: 'T extends Entity' }],
    });

    expect(methodDeclaration(find)).toBe('async find<T extends Entity>(ctx: Context, req: string): Promise<T | null> {');
    expect(delegateCall('this.next', find)).toBe('this.next.find<T>(ctx, req)');
  });
});

describe('bindResults', () => {
  it('should destructure a tuple', () => {
    expect(bindResults(getUser)).toBe('const [arg0, err] = ');
  });

  it('should bind a single result by its name', () => {
    expect(bindResults(saveUser)).toBe('const err = ');
    expect(bindResults(count)).toBe('const arg0 = ');
  });

  it('should bind nothing for void', () => {
    expect(bindResults(touch)).toBe('');
  });
});

describe('errorReturn / successReturn', () => {
  it('should put zero values before the error and null in the error slot', () => {
    expect(errorReturn(getUser, 'err')).toBe('[null, err]');
    expect(successReturn(getUser)).toBe('[arg0, null]');
  });

  it('should use scalar zero values', () => {
    const stats = method('stats', { results: [NUMBER, STRING, NULLABLE_ERROR] });

    expect(errorReturn(stats, 'err')).toBe("[0, '', err]");
  });

  it('should return the bare error for an error-only method', () => {
    expect(errorReturn(saveUser, 'err')).toBe('err');
    expect(successReturn(saveUser)).toBe('null');
  });

  it('should keep a one-element tuple a tuple', () => {
    const ping = method('ping', { results: [NULLABLE_ERROR], style: 'tuple' });

    expect(bindResults(ping)).toBe('const [err] = ');
    expect(errorReturn(ping, 'err')).toBe('[err]');
    expect(successReturn(ping)).toBe('[null]');
  });

  it('should return nothing for void', () => {
    expect(successReturn(touch)).toBeUndefined();
  });

  it('should name the method and result that has no zero value', () => {
    const list = method('list', { results: [ref('User[]', 'array'), NULLABLE_ERROR] });

    expect(() => errorReturn(list, 'err')).toThrow(ZeroValueError);
    expect(() => errorReturn(list, 'err')).toThrow(/^Method list, result 0: No zero value known for type 'User\[\]'/);
  });
});

describe('callThrough', () => {
  it('should propagate the error and return the results', () => {
    expect(callThrough(getUser, 'this.next.getUser(ctx, req)')).toEqual([
      'const [arg0, err] = await this.next.getUser(ctx, req);',
      'if (err) {',
      '  return [null, err];',
      '}',
      'return [arg0, null];',
    ]);
  });

  it('should return a result without an error directly', () => {
    expect(callThrough(count, 'this.next.count(ctx)')).toEqual([
      'const arg0 = await this.next.count(ctx);',
      'return arg0;',
    ]);
  });

  it('should only await a void call', () => {
    expect(callThrough(touch, 'this.next.touch(ctx)')).toEqual(['await this.next.touch(ctx);']);
  });
});

describe('helpers', () => {
  it('should indent non-empty lines only', () => {
    expect(indent(['a', '', 'b'], 2)).toEqual(['    a', '', '    b']);
  });

  it('should sort methods by name', () => {
    const sorted = sortedMethods(model('UserStore', [touch, getUser, count]));

    expect(sorted.map((entry) => entry.name)).toEqual(['count', 'getUser', 'touch']);
  });
});
