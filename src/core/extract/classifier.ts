/**
 * Type classifier.
 *
 * Maps a checker type onto the coarse kinds of the signature model. The
 * context and error carriers are recognised by symbol name, so any type
 * called `Context` (or whatever the configuration names) qualifies.
 */
import { Node, ts, type Type, type TypeNode } from 'ts-morph';
import type { AbsentLiteral, ScalarKind, TypeRef } from '../model/types.js';

export interface CarrierNames {
  contextType: string;
  errorType: string;
}

export class TypeClassifier {
  constructor(private readonly names: CarrierNames) {}

  /**
   * Classify `type`, reporting it as `text`.
   * @param written - the annotation as written, when there is one; a type
   *   reference to a primitive alias classifies as `named`
   */
  classify(type: Type, text: string, written?: TypeNode): TypeRef {
    if (type.isVoid() || type.isUndefined()) {
      return { text, kind: 'void' };
    }

    if (hasName(type, this.names.contextType)) {
      return { text, kind: 'context' };
    }

    const absent = absentOf(type);
    const core = absent ? type.getNonNullableType() : type;

    if (hasName(core, this.names.errorType)) {
      return absent ? { text, kind: 'error', absent } : { text, kind: 'error' };
    }

    if (absent) {
      return { text, kind: 'reference', absent };
    }

    if (core.isEnum() || core.isEnumLiteral()) {
      return hasZeroMember(core) ? { text, kind: 'named', scalar: 'number' } : { text, kind: 'named' };
    }

    const scalar = scalarOf(core);
    if (scalar) {
      const named = core.getAliasSymbol() !== undefined || (written !== undefined && Node.isTypeReference(written));
      return { text, kind: named ? 'named' : 'scalar', scalar };
    }

    if (core.isArray() || core.isTuple()) {
      return { text, kind: 'array' };
    }

    if (core.isObject()) {
      return { text, kind: 'interface' };
    }

    return { text, kind: 'other' };
  }
}

function hasName(type: Type, name: string): boolean {
  return type.getAliasSymbol()?.getName() === name || type.getSymbol()?.getName() === name;
}

/**
 * The literal a nullable type admits, preferring null.
 */
function absentOf(type: Type): AbsentLiteral | undefined {
  if (type.isNull()) {
    return 'null';
  }
  if (!type.isUnion()) {
    return undefined;
  }
  const members = type.getUnionTypes();
  if (members.some((member) => member.isNull())) {
    return 'null';
  }
  if (members.some((member) => member.isUndefined())) {
    return 'undefined';
  }
  return undefined;
}

/**
 * A numeric enum with a member whose value is 0; `0` is only assignable to
 * an enum that declares it.
 */
function hasZeroMember(type: Type): boolean {
  const members = type.isUnion() ? type.getUnionTypes() : [type];
  return (
    members.every((member) => member.isNumberLiteral()) &&
    members.some((member) => member.getLiteralValue() === 0)
  );
}

function scalarOf(type: Type): ScalarKind | undefined {
  if (type.isNumber()) return 'number';
  if (type.isString()) return 'string';
  if (type.isBoolean()) return 'boolean';
  if (type.getFlags() & ts.TypeFlags.BigInt) return 'bigint';
  return undefined;
}
