import { describe, it, expect, vi, type Mock } from 'vitest';
import { ROOT_CONTEXT, trace, type Context, type Span } from '@opentelemetry/api';
import { ImportCollector } from '../../../../src/core/imports/collector.js';
import { render } from '../../../../src/core/patterns/engine.js';
import type { TraceSpec } from '../../../../src/core/patterns/types.js';
import { PatternConfigurationError } from '../../../../src/utils/errors.js';
import { loadModule } from '../../../fixtures/load-module.js';
import { CONTEXT, NULLABLE_ERROR, method, model, nullable, ref } from '../../../fixtures/models.js';

const store = model('UserStore', [
  method('getUser', { parameters: [CONTEXT, ref('GetUserRequest')], results: [nullable('User'), NULLABLE_ERROR] }),
  method('touch', { parameters: [CONTEXT] }),
]);

const spec: TraceSpec = {
  kind: 'trace',
  className: 'UserStoreTracer',
  interfaceName: 'UserStore',
  interfaceQualifiedName: 'UserStore',
};

function renderStore(target = store): string {
  const imports = new ImportCollector('/project/src/store');
  imports.useInterface(target);
  return render(spec, target, { imports, sourceLabel: 'user-store.ts' });
}

type GetUser = (ctx: Context, id: string) => Promise<[{ id: string } | null, Error | null]>;
type Touch = (ctx: Context) => Promise<void>;
interface Store {
  getUser: GetUser;
  touch: Touch;
}
interface FakeTracer {
  startSpan: (name: string, options: object, ctx: Context) => Span;
}

function loadTracer(): new (next: Store, prefix: string, tracer?: FakeTracer) => Store {
  const { UserStoreTracer } = loadModule(renderStore()) as {
    UserStoreTracer: new (next: Store, prefix: string, tracer?: FakeTracer) => Store;
  };
  return UserStoreTracer;
}

function fakeSpan(): Span & { end: Mock<() => void> } {
  const span = trace.wrapSpanContext({ traceId: '0'.repeat(31) + '1', spanId: '0'.repeat(15) + '1', traceFlags: 1 });
  return Object.assign(span, { end: vi.fn<() => void>() });
}

describe('trace pattern', () => {
  it('should import the tracing API beside the interface', () => {
    const lines = renderStore().split('\n');

    expect(lines.slice(0, 6)).toEqual([
      '// Code generated by wrapgen. DO NOT EDIT.',
      '// Source: user-store.ts (interface UserStore, pattern trace)',
      '',
      "import { type Tracer, trace } from '@opentelemetry/api';",
      "import type { UserStore } from './user-store.js';",
      '',
    ]);
  });

  it('should open a span and replace the context before delegating', () => {
    const output = renderStore();

    expect(output).toContain(
      [
        'export class UserStoreTracer implements UserStore {',
        '  constructor(',
        '    private readonly next: UserStore,',
        '    private readonly prefix: string,',
        '    private readonly tracer: Tracer = trace.getTracer(prefix),',
        '  ) {}',
        '',
        '  async getUser(ctx: Context, req: GetUserRequest): Promise<[User | null, Error | null]> {',
        '    const span = this.tracer.startSpan(`${this.prefix}.UserStore.getUser`, {}, ctx);',
        '    ctx = trace.setSpan(ctx, span);',
        '    try {',
        '      const [arg0, err] = await this.next.getUser(ctx, req);',
        '      if (err) {',
        '        return [null, err];',
        '      }',
        '      return [arg0, null];',
        '    } finally {',
        '      span.end();',
        '    }',
        '  }',
        '',
        '  async touch(ctx: Context): Promise<void> {',
        '    const span = this.tracer.startSpan(`${this.prefix}.UserStore.touch`, {}, ctx);',
        '    ctx = trace.setSpan(ctx, span);',
        '    try {',
        '      await this.next.touch(ctx);',
        '    } finally {',
        '      span.end();',
        '    }',
        '  }',
        '}',
      ].join('\n')
    );
    expect(output).toContain(
      'export function createUserStoreTracer(next: UserStore, prefix: string, tracer?: Tracer): UserStoreTracer {'
    );
  });

  it('should name spans after the interface as the module refers to it', () => {
    const imports = new ImportCollector('/project/src/generated');
    const interfaceQualifiedName = imports.useInterface(store);

    const output = render({ ...spec, interfaceQualifiedName }, store, { imports, sourceLabel: '../store/user-store.ts' });

    expect(interfaceQualifiedName).toBe('store.UserStore');
    expect(output).toContain(' * Spans are named `<prefix>.store.UserStore.<method>` and parented on the');
    expect(output).toContain('    const span = this.tracer.startSpan(`${this.prefix}.store.UserStore.touch`, {}, ctx);');
  });

  it('should refuse an interface with a method named tracer', () => {
    const clashing = model('UserStore', [method('tracer', { parameters: [CONTEXT] })]);

    expect(() => renderStore(clashing)).toThrow(PatternConfigurationError);
  });

  it('should name the span and pass it to the delegate', async () => {
    const UserStoreTracer = loadTracer();
    const span = fakeSpan();
    const tracer = { startSpan: vi.fn<FakeTracer['startSpan']>(() => span) };
    const getUser = vi.fn<GetUser>(async (ctx, id) => {
      expect(trace.getSpan(ctx)).toBe(span);
      expect(span.end).not.toHaveBeenCalled();
      return [{ id }, null];
    });
    const wrapped = new UserStoreTracer({ getUser, touch: vi.fn<Touch>() }, 'users', tracer);

    const result = await wrapped.getUser(ROOT_CONTEXT, 'u1');

    expect(result).toEqual([{ id: 'u1' }, null]);
    expect(tracer.startSpan).toHaveBeenCalledWith('users.UserStore.getUser', {}, ROOT_CONTEXT);
    expect(getUser).toHaveBeenCalledTimes(1);
    expect(span.end).toHaveBeenCalledTimes(1);
  });

  it('should end the span when the delegate throws', async () => {
    const UserStoreTracer = loadTracer();
    const span = fakeSpan();
    const failure = new Error('backend down');
    const wrapped = new UserStoreTracer(
      { getUser: vi.fn<GetUser>(), touch: vi.fn<Touch>().mockRejectedValue(failure) },
      'users',
      { startSpan: () => span }
    );

    await expect(wrapped.touch(ROOT_CONTEXT)).rejects.toBe(failure);
    expect(span.end).toHaveBeenCalledTimes(1);
  });

  it('should fall back to the global tracer', async () => {
    const UserStoreTracer = loadTracer();
    const touch = vi.fn<Touch>().mockResolvedValue(undefined);
    const wrapped = new UserStoreTracer({ getUser: vi.fn<GetUser>(), touch }, 'users');

    await wrapped.touch(ROOT_CONTEXT);

    expect(touch).toHaveBeenCalledTimes(1);
  });
});
