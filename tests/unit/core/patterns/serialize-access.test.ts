import { describe, it, expect, vi } from 'vitest';
import { ImportCollector } from '../../../../src/core/imports/collector.js';
import { render } from '../../../../src/core/patterns/engine.js';
import type { SerializeAccessSpec } from '../../../../src/core/patterns/types.js';
import { PatternConfigurationError } from '../../../../src/utils/errors.js';
import { loadModule } from '../../../fixtures/load-module.js';
import { CONTEXT, NULLABLE_ERROR, method, model, nullable, ref } from '../../../fixtures/models.js';

const store = model('UserStore', [
  method('getUser', { parameters: [CONTEXT, ref('GetUserRequest')], results: [nullable('User'), NULLABLE_ERROR] }),
]);

const spec: SerializeAccessSpec = {
  kind: 'serialize-access',
  className: 'UserStoreTracer',
  interfaceName: 'UserStore',
  interfaceQualifiedName: 'UserStore',
};

function renderStore(target = store): string {
  const imports = new ImportCollector('/project/src/store');
  imports.useInterface(target);
  return render(spec, target, { imports, sourceLabel: 'user-store.ts' });
}

describe('serialize-access pattern', () => {
  it('should render the complete module', () => {
    expect(renderStore()).toBe(
      [
        '// Code generated by wrapgen. DO NOT EDIT.',
        '// Source: user-store.ts (interface UserStore, pattern serialize-access)',
        '',
        "import { Mutex } from 'async-mutex';",
        "import type { UserStore } from './user-store.js';",
        '',
        '/**',
        ' * UserStoreTracer serializes access to a UserStore: calls through it',
        ' * run one at a time, in the order they arrive.',
        ' */',
        'export class UserStoreTracer implements UserStore {',
        '  private readonly mutex = new Mutex();',
        '',
        '  constructor(private readonly next: UserStore) {}',
        '',
        '  async getUser(ctx: Context, req: GetUserRequest): Promise<[User | null, Error | null]> {',
        '    const release = await this.mutex.acquire();',
        '    try {',
        '      const [arg0, err] = await this.next.getUser(ctx, req);',
        '      if (err) {',
        '        return [null, err];',
        '      }',
        '      return [arg0, null];',
        '    } finally {',
        '      release();',
        '    }',
        '  }',
        '}',
        '',
        '/**',
        ' * Wrap `next` so that no two calls to it overlap.',
        ' */',
        'export function createUserStoreTracer(next: UserStore): UserStoreTracer {',
        '  return new UserStoreTracer(next);',
        '}',
        '',
      ].join('\n')
    );
  });

  it('should refuse an interface with a method named like its own members', () => {
    const clashing = model('UserStore', [method('next', { results: [NULLABLE_ERROR] })]);

    expect(() => renderStore(clashing)).toThrow(PatternConfigurationError);
  });

  it('should run calls one at a time', async () => {
    type GetUser = (ctx: unknown, id: string) => Promise<[{ id: string } | null, Error | null]>;
    const { UserStoreTracer } = loadModule(renderStore()) as {
      UserStoreTracer: new (next: { getUser: GetUser }) => { getUser: GetUser };
    };

    const events: string[] = [];
    let releaseFirst = (): void => {};
    const next = {
      getUser: vi.fn<GetUser>(async (_ctx, id) => {
        events.push(`start ${id}`);
        if (id === 'a') {
          await new Promise<void>((resolve) => {
            releaseFirst = resolve;
          });
        }
        events.push(`end ${id}`);
        return [{ id }, null];
      }),
    };
    const wrapped = new UserStoreTracer(next);

    const first = wrapped.getUser({}, 'a');
    const second = wrapped.getUser({}, 'b');
    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(events).toEqual(['start a']);

    releaseFirst();
    expect(await first).toEqual([{ id: 'a' }, null]);
    expect(await second).toEqual([{ id: 'b' }, null]);
    expect(events).toEqual(['start a', 'end a', 'start b', 'end b']);
  });

  it('should release the lock when the delegate throws', async () => {
    type GetUser = (ctx: unknown, id: string) => Promise<[{ id: string } | null, Error | null]>;
    const { UserStoreTracer } = loadModule(renderStore()) as {
      UserStoreTracer: new (next: { getUser: GetUser }) => { getUser: GetUser };
    };
    const failure = new Error('backend down');
    const next = {
      getUser: vi.fn<GetUser>().mockRejectedValueOnce(failure).mockResolvedValueOnce([{ id: 'b' }, null]),
    };
    const wrapped = new UserStoreTracer(next);

    await expect(wrapped.getUser({}, 'a')).rejects.toBe(failure);
    expect(await wrapped.getUser({}, 'b')).toEqual([{ id: 'b' }, null]);
  });

  it('should return the delegate error with zero values', async () => {
    type GetUser = (ctx: unknown, id: string) => Promise<[{ id: string } | null, Error | null]>;
    const { UserStoreTracer } = loadModule(renderStore()) as {
      UserStoreTracer: new (next: { getUser: GetUser }) => { getUser: GetUser };
    };
    const notFound = new Error('not found');
    const wrapped = new UserStoreTracer({ getUser: async () => [{ id: 'stale' }, notFound] });

    expect(await wrapped.getUser({}, 'a')).toEqual([null, notFound]);
  });
});
