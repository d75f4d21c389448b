/**
 * Tests for error classes and codes.
 */
import { describe, it, expect } from 'vitest';
import {
  WrapgenError,
  ConfigError,
  ExtractionError,
  NotFoundError,
  NotAnInterfaceError,
  TypeResolutionError,
  ValidationError,
  ZeroValueError,
  PatternConfigurationError,
  RenderError,
  WriteError,
  SystemError,
  ErrorCodes,
} from '../../../src/utils/errors.js';

describe('WrapgenError', () => {
  it('should create error with code and message', () => {
    const error = new WrapgenError('X001', 'Interface missing');

    expect(error.code).toBe('X001');
    expect(error.message).toBe('Interface missing');
    expect(error.name).toBe('WrapgenError');
    expect(error).toBeInstanceOf(Error);
  });

  it('should have a stack trace', () => {
    const error = new WrapgenError('X001', 'Interface missing');

    expect(error.stack).toContain('WrapgenError');
  });

  describe('toJSON', () => {
    it('should serialize name, code, message and details', () => {
      const error = new WrapgenError('W001', 'Cannot write', { path: '/out/store_gen.ts' });

      expect(error.toJSON()).toEqual({
        name: 'WrapgenError',
        code: 'W001',
        message: 'Cannot write',
        details: { path: '/out/store_gen.ts' },
      });
    });

    it('should leave details undefined when none were given', () => {
      expect(new WrapgenError('W001', 'Cannot write').toJSON().details).toBeUndefined();
    });
  });
});

describe('extraction errors', () => {
  it('should fix the code of NotFoundError', () => {
    const error = new NotFoundError('No type named UserStore', { name: 'UserStore' });

    expect(error.code).toBe(ErrorCodes.NOT_FOUND);
    expect(error.name).toBe('NotFoundError');
    expect(error).toBeInstanceOf(ExtractionError);
    expect(error).toBeInstanceOf(WrapgenError);
  });

  it('should fix the code of NotAnInterfaceError', () => {
    const error = new NotAnInterfaceError('UserStore is a ClassDeclaration');

    expect(error.code).toBe('X002');
    expect(error).toBeInstanceOf(ExtractionError);
  });

  it('should fix the code of TypeResolutionError', () => {
    const error = new TypeResolutionError('Cannot resolve type Missing', { type: 'Missing' });

    expect(error.code).toBe('X003');
    expect(error.details).toEqual({ type: 'Missing' });
  });

  it('should accept extraction codes on the base class', () => {
    const error = new ExtractionError(ErrorCodes.OVERLOADED_METHOD, 'Overloaded');

    expect(error.code).toBe('X006');
    expect(error.name).toBe('ExtractionError');
  });
});

describe('generation errors', () => {
  it.each([
    [new ValidationError(ErrorCodes.METHOD_INVALID, 'bad'), 'ValidationError', 'V001'],
    [new ZeroValueError('no zero'), 'ZeroValueError', 'Z001'],
    [new PatternConfigurationError(ErrorCodes.NOT_A_CLIENT, 'not a client'), 'PatternConfigurationError', 'P001'],
    [new RenderError('render'), 'RenderError', 'R001'],
    [new WriteError('write'), 'WriteError', 'W001'],
    [new ConfigError('CONFIG_NOT_FOUND', 'missing'), 'ConfigError', 'CONFIG_NOT_FOUND'],
    [new SystemError(ErrorCodes.PARSE_ERROR, 'parse'), 'SystemError', 'S001'],
  ])('%s carries its name and code', (error, name, code) => {
    expect(error.name).toBe(name);
    expect(error.code).toBe(code);
    expect(error).toBeInstanceOf(WrapgenError);
  });
});

describe('ErrorCodes', () => {
  it('should keep every code unique', () => {
    const codes = Object.values(ErrorCodes);

    expect(new Set(codes).size).toBe(codes.length);
  });

  it('should group pattern configuration codes under P', () => {
    expect(ErrorCodes.NOT_A_CLIENT).toBe('P001');
    expect(ErrorCodes.MISSING_DELEGATE).toBe('P002');
    expect(ErrorCodes.UNKNOWN_METHOD).toBe('P003');
    expect(ErrorCodes.INVALID_NAME).toBe('P004');
    expect(ErrorCodes.RESERVED_MEMBER).toBe('P005');
    expect(ErrorCodes.UNKNOWN_KIND).toBe('P006');
    expect(ErrorCodes.OPTION_UNSUPPORTED).toBe('P007');
  });
});
