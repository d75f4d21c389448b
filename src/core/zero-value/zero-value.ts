/**
 * Zero-value deriver.
 *
 * Supplies the literal returned for a non-error result when a generated
 * method fails. Only primitive-like and nullable types have one; composite
 * types are refused rather than guessed.
 */
import type { ScalarKind, TypeRef } from '../model/types.js';
import { ZeroValueError } from '../../utils/errors.js';

/**
 * Empty literal for each scalar representation.
 */
export const ZERO_VALUES: Readonly<Record<ScalarKind, string>> = Object.freeze({
  number: '0',
  bigint: '0n',
  string: "''",
  boolean: 'false',
});

/**
 * Zero value of a result type.
 * @throws ZeroValueError when the type has no known empty literal
 */
export function zeroValueOf(type: TypeRef): string {
  if ((type.kind === 'scalar' || type.kind === 'named') && type.scalar) {
    return ZERO_VALUES[type.scalar];
  }

  if (type.absent) {
    return type.absent;
  }

  throw new ZeroValueError(
    `No zero value known for type '${type.text}' (${type.kind}); ` +
      'only number, bigint, string, boolean, aliases of those, numeric enums with a zero member, ' +
      'and nullable types can be returned on the error path',
    { type: type.text, kind: type.kind }
  );
}
