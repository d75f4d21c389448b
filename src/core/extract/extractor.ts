/**
 * Interface extractor.
 *
 * Locates an interface by name in a source project and builds its signature
 * model: methods inherited through `extends` first, then its own, each with
 * classified parameters and results.
 */
import {
  Node,
  SyntaxKind,
  ts,
  type InterfaceDeclaration,
  type MethodSignature as MethodNode,
  type Type,
} from 'ts-morph';
import type {
  InterfaceModel,
  MethodSignature,
  Parameter,
  Result,
  ResultStyle,
} from '../model/types.js';
import { ExtractionError, ErrorCodes, NotAnInterfaceError, NotFoundError, TypeResolutionError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { TypeClassifier, type CarrierNames } from './classifier.js';
import type { SourceProject } from './project.js';
import { isResolvable, leftmostIdentifier } from './symbols.js';

/**
 * The model together with the syntax it was built from. Import collection
 * needs the method nodes; everything else only needs the model.
 */
export interface ExtractedInterface {
  model: InterfaceModel;
  declaration: InterfaceDeclaration;
  /** Same order as `model.methods` */
  methodNodes: MethodNode[];
}

export class InterfaceExtractor {
  private readonly classifier: TypeClassifier;

  constructor(
    private readonly source: SourceProject,
    names: CarrierNames
  ) {
    this.classifier = new TypeClassifier(names);
  }

  extract(interfaceName: string): InterfaceModel {
    return this.extractDeclaration(interfaceName).model;
  }

  /**
   * @throws NotFoundError, NotAnInterfaceError, ExtractionError, TypeResolutionError
   */
  extractDeclaration(interfaceName: string): ExtractedInterface {
    const declaration = this.locate(interfaceName);

    if (declaration.getTypeParameters().length > 0) {
      throw new ExtractionError(
        ErrorCodes.UNSUPPORTED_INTERFACE,
        `Interface ${interfaceName} is generic; only non-generic interfaces can be decorated`,
        { interface: interfaceName }
      );
    }

    const nodes = new Map<string, MethodNode>();
    this.collectMethods(declaration, nodes, new Set());

    const methods = new Map<string, MethodSignature>();
    for (const [name, node] of nodes) {
      methods.set(name, this.toSignature(node));
    }

    logger.debug(`Extracted ${methods.size} method(s) from ${interfaceName}`, {
      file: declaration.getSourceFile().getFilePath(),
    });

    return {
      model: {
        name: interfaceName,
        filePath: declaration.getSourceFile().getFilePath(),
        methods,
      },
      declaration,
      methodNodes: [...nodes.values()],
    };
  }

  /**
   * First top-level declaration named `name`. The generated module imports
   * it, so it must be exported.
   */
  private locate(name: string): InterfaceDeclaration {
    const matches = this.source.findDeclarations(name);
    const [first] = matches;
    if (!first) {
      throw new NotFoundError(`No type named ${name} in the source location`, { name });
    }

    if (new Set(matches.map((match) => match.getSourceFile())).size > 1) {
      logger.warn(`Multiple declarations named ${name}; using ${first.getSourceFile().getFilePath()}`);
    }

    if (!Node.isInterfaceDeclaration(first)) {
      throw new NotAnInterfaceError(`${name} is a ${first.getKindName()}, not an interface`, {
        name,
        kind: first.getKindName(),
      });
    }

    if (!first.isExported()) {
      const file = first.getSourceFile().getFilePath();
      throw new TypeResolutionError(`Interface ${name} is declared in ${file} but not exported`, { name, file });
    }
    return first;
  }

  /**
   * Gather method nodes, base interfaces first. A method redeclared by a
   * derived interface keeps its base position but takes the derived node.
   */
  private collectMethods(
    declaration: InterfaceDeclaration,
    nodes: Map<string, MethodNode>,
    visited: Set<InterfaceDeclaration>
  ): void {
    if (visited.has(declaration)) return;
    visited.add(declaration);

    for (const base of this.baseInterfaces(declaration)) {
      this.collectMethods(base, nodes, visited);
    }

    const name = declaration.getName();
    const unsupported =
      declaration.getProperties()[0] ??
      declaration.getCallSignatures()[0] ??
      declaration.getConstructSignatures()[0] ??
      declaration.getIndexSignatures()[0];
    if (unsupported) {
      throw new ExtractionError(
        ErrorCodes.UNSUPPORTED_MEMBER,
        `Interface ${name} has a member that is not a method: ${unsupported.getText()}`,
        { interface: name, member: unsupported.getText() }
      );
    }

    const own = new Set<string>();
    for (const method of declaration.getMethods()) {
      if (method.getNameNode().getKind() === SyntaxKind.ComputedPropertyName) {
        throw new ExtractionError(
          ErrorCodes.UNSUPPORTED_MEMBER,
          `Interface ${name} has a method with a computed name: ${method.getName()}`,
          { interface: name, member: method.getName() }
        );
      }

      const methodName = method.getName();
      if (own.has(methodName)) {
        throw new ExtractionError(
          ErrorCodes.OVERLOADED_METHOD,
          `Method ${name}.${methodName} is overloaded; each method needs a single signature`,
          { interface: name, method: methodName }
        );
      }
      own.add(methodName);
      nodes.set(methodName, method);
    }
  }

  private baseInterfaces(declaration: InterfaceDeclaration): InterfaceDeclaration[] {
    const bases: InterfaceDeclaration[] = [];
    for (const clause of declaration.getExtends()) {
      const expression = clause.getExpression();
      const identifier = leftmostIdentifier(expression);
      if (!identifier || !isResolvable(identifier)) {
        throw new TypeResolutionError(
          `Cannot resolve base interface ${expression.getText()} of ${declaration.getName()}`,
          { interface: declaration.getName(), base: expression.getText() }
        );
      }

      const declarations = clause.getType().getSymbol()?.getDeclarations() ?? [];
      const base = declarations.find((candidate) => Node.isInterfaceDeclaration(candidate));
      if (!base || !Node.isInterfaceDeclaration(base) || clause.getTypeArguments().length > 0) {
        throw new ExtractionError(
          ErrorCodes.UNSUPPORTED_INTERFACE,
          `${declaration.getName()} extends ${clause.getText()}; only non-generic interfaces can be inherited`,
          { interface: declaration.getName(), base: clause.getText() }
        );
      }
      bases.push(base);
    }
    return bases;
  }

  private toSignature(node: MethodNode): MethodSignature {
    const name = node.getName();

    const parameters: Parameter[] = node.getParameters().map((parameter, index) => {
      const typeNode = parameter.getTypeNode();
      if (!typeNode) {
        throw new TypeResolutionError(`Parameter ${index} of method ${name} has no type annotation`, {
          method: name,
          parameter: index,
        });
      }
      this.assertResolvable(typeNode, name);
      return {
        index,
        type: this.classifier.classify(parameter.getType(), typeNode.getText(), typeNode),
        variadic: parameter.isRestParameter(),
        optional: parameter.hasQuestionToken(),
      };
    });

    const returnTypeNode = node.getReturnTypeNode();
    if (!returnTypeNode) {
      throw new TypeResolutionError(`Method ${name} has no return type annotation`, { method: name });
    }
    this.assertResolvable(returnTypeNode, name);

    const returnType = node.getReturnType();
    const isAsync = returnType.getSymbol()?.getName() === 'Promise';
    const awaited = isAsync ? returnType.getTypeArguments()[0] : returnType;
    const { style, types } = resultTypes(awaited);

    const results: Result[] = types.map((type, index) => {
      const text = type.getText(node, ts.TypeFormatFlags.UseAliasDefinedOutsideCurrentScope);
      const classified = this.classifier.classify(type, text);
      return {
        index,
        type: classified,
        isTerminalError: index === types.length - 1 && classified.kind === 'error' && classified.absent !== undefined,
      };
    });

    return {
      name,
      parameters,
      results,
      resultStyle: style,
      async: isAsync,
      returnTypeText: returnTypeNode.getText(),
      typeParameters: node.getTypeParameters().map((parameter) => ({
        name: parameter.getName(),
        text: parameter.getText(),
      })),
    };
  }

  /**
   * Every type name in `node` must resolve to a declaration.
   */
  private assertResolvable(node: Node, method: string): void {
    const references = node.getDescendantsOfKind(SyntaxKind.TypeReference);
    if (Node.isTypeReference(node)) {
      references.unshift(node);
    }

    for (const reference of references) {
      const identifier = leftmostIdentifier(reference.getTypeName());
      if (identifier && !isResolvable(identifier)) {
        throw new TypeResolutionError(
          `Cannot resolve type ${reference.getTypeName().getText()} in method ${method}`,
          { method, type: reference.getTypeName().getText() }
        );
      }
    }
  }
}

function resultTypes(awaited: Type | undefined): { style: ResultStyle; types: Type[] } {
  if (!awaited || awaited.isVoid() || awaited.isUndefined()) {
    return { style: 'void', types: [] };
  }
  if (awaited.isTuple()) {
    return { style: 'tuple', types: awaited.getTupleElements() };
  }
  return { style: 'single', types: [awaited] };
}
