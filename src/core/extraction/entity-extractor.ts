/**
 * Entity Extractor
 *
 * Turns one Python file into an ordered list of entities:
 * the File, its module docstring, then declarations in source order.
 *
 * Only module and class bodies are walked. Functions nested inside functions
 * are not emitted, and calls inside them are not attributed to the outer one.
 *
 * @module
 */

import type { ParserManager } from "../parser/parser-manager.js";
import { CallExtractor } from "../parser/call-extractor.js";
import {
  childrenOf,
  docstringOf,
  findFirstError,
  lineOf,
  namedChildrenOf,
  walk,
  type SyntaxNode,
} from "../parser/syntax-nodes.js";
import { FileParsingError } from "../errors.js";
import { modulePathFor, packagePathFor } from "./id-generator.js";
import type { CallReference, Entity, EntityKind, FileExtraction } from "./types.js";

// =============================================================================
// Types
// =============================================================================

/**
 * File-level values shared by every entity of one extraction.
 */
interface FileScope {
  filePath: string;
  qualifiedModule: string;
  packagePath: string;
}

/**
 * Fields that vary per entity; the rest default to empty.
 */
type EntityFields = Partial<Omit<Entity, "kind" | "name" | keyof FileScope>> & {
  kind: EntityKind;
  name: string;
  lineNumber: number;
};

const MAX_ERROR_SNIPPET = 40;

// =============================================================================
// Entity Extractor
// =============================================================================

/**
 * Extracts entities and import identifiers from Python source.
 *
 * @example
 * ```typescript
 * const parser = await getSharedParserManager();
 * const extractor = new EntityExtractor(parser);
 *
 * const result = extractor.extract("pkg/sub.py", "from pkg import Base\n\nclass Sub(Base):\n    pass\n");
 * result.entities.map((e) => `${e.kind}:${e.name}`); // ["File:pkg.sub", "Class:Sub"]
 * result.imports; // ["pkg"]
 * ```
 */
export class EntityExtractor {
  constructor(
    private readonly parser: ParserManager,
    private readonly callExtractor: CallExtractor = new CallExtractor()
  ) {}

  /**
   * Parses and extracts one file.
   *
   * @param filePath - Repository-relative path, used for module naming
   * @throws FileParsingError when the source has a syntax error
   */
  extract(filePath: string, sourceCode: string): FileExtraction {
    const normalizedPath = filePath.replace(/\\/g, "/");
    const { tree } = this.parser.parseFile(normalizedPath, sourceCode);

    try {
      const root = tree.rootNode;
      const errorNode = findFirstError(root);
      if (errorNode) {
        const line = lineOf(errorNode);
        throw new FileParsingError(
          normalizedPath,
          `Syntax error at line ${line}: ${describeError(errorNode)}`,
          line
        );
      }

      const scope: FileScope = {
        filePath: normalizedPath,
        qualifiedModule: modulePathFor(normalizedPath),
        packagePath: packagePathFor(normalizedPath),
      };

      const entities: Entity[] = [];
      const moduleDocstring = docstringOf(root);
      entities.push(
        makeEntity(scope, { kind: "File", name: scope.qualifiedModule, lineNumber: 1, docstring: moduleDocstring })
      );
      if (moduleDocstring !== null) {
        entities.push(
          makeEntity(scope, {
            kind: "Docstring",
            name: `${scope.filePath}::docstring`,
            lineNumber: 1,
            owner: scope.qualifiedModule,
            content: moduleDocstring,
          })
        );
      }

      this.walkBody(root, scope, [], entities);

      return {
        ...scope,
        entities,
        imports: collectImports(root),
      };
    } finally {
      tree.delete();
    }
  }

  /**
   * Walks a module or class body. `classStack` holds the enclosing class names.
   */
  private walkBody(body: SyntaxNode, scope: FileScope, classStack: string[], out: Entity[]): void {
    for (const statement of namedChildrenOf(body)) {
      const { definition, decorators } = unwrapDecorated(statement);
      if (!definition) continue;

      if (definition.type === "class_definition") {
        this.extractClass(definition, decorators, scope, classStack, out);
      } else if (definition.type === "function_definition") {
        this.extractFunction(definition, decorators, scope, classStack, out);
      }
    }
  }

  private extractClass(
    node: SyntaxNode,
    decorators: string[],
    scope: FileScope,
    classStack: string[],
    out: Entity[]
  ): void {
    const name = node.childForFieldName("name")?.text;
    if (!name) return;

    const body = node.childForFieldName("body");
    const docstring = docstringOf(body);

    out.push(
      makeEntity(scope, {
        kind: "Class",
        name,
        lineNumber: lineOf(node),
        docstring,
        decorators,
        bases: superclassesOf(node),
        parentClass: null,
      })
    );
    if (docstring !== null) {
      out.push(
        makeEntity(scope, {
          kind: "Docstring",
          name: `${scope.filePath}::${name}::docstring`,
          lineNumber: lineOf(node),
          owner: name,
          content: docstring,
        })
      );
    }

    if (body) {
      classStack.push(name);
      this.walkBody(body, scope, classStack, out);
      classStack.pop();
    }
  }

  private extractFunction(
    node: SyntaxNode,
    decorators: string[],
    scope: FileScope,
    classStack: string[],
    out: Entity[]
  ): void {
    const name = node.childForFieldName("name")?.text;
    if (!name) return;

    const parentClass = classStack[classStack.length - 1] ?? null;
    const kind: EntityKind = parentClass ? "Method" : "Function";
    const owner = parentClass ? `${parentClass}.${name}` : name;
    const line = lineOf(node);

    const body = node.childForFieldName("body");
    const docstring = docstringOf(body);
    const parameters = parameterNames(node.childForFieldName("parameters"));
    const returnType = node.childForFieldName("return_type")?.text ?? null;
    const calls: CallReference[] = this.callExtractor.extractFromBody(body);

    out.push(
      makeEntity(scope, {
        kind,
        name,
        lineNumber: line,
        docstring,
        decorators,
        parameters,
        isAsync: childrenOf(node).some((child) => child.type === "async"),
        parentClass,
        returnType,
        calls,
      })
    );

    for (const parameter of parameters) {
      out.push(
        makeEntity(scope, {
          kind: "Parameter",
          name: `${owner}.${parameter}`,
          lineNumber: line,
          owner,
        })
      );
    }

    if (returnType !== null) {
      out.push(makeEntity(scope, { kind: "ReturnType", name: returnType, lineNumber: line, owner }));
    }

    if (docstring !== null) {
      out.push(
        makeEntity(scope, {
          kind: "Docstring",
          name: `${scope.filePath}::${owner}::docstring`,
          lineNumber: line,
          owner,
          content: docstring,
        })
      );
    }
  }
}

// =============================================================================
// Syntax Helpers
// =============================================================================

function makeEntity(scope: FileScope, fields: EntityFields): Entity {
  return {
    qualifiedModule: scope.qualifiedModule,
    packagePath: scope.packagePath,
    filePath: scope.filePath,
    docstring: null,
    decorators: [],
    bases: [],
    parameters: [],
    isAsync: false,
    parentClass: null,
    returnType: null,
    calls: [],
    owner: null,
    content: null,
    ...fields,
  };
}

/**
 * Splits a `decorated_definition` into its definition and decorator texts.
 */
function unwrapDecorated(statement: SyntaxNode): { definition: SyntaxNode | null; decorators: string[] } {
  if (statement.type !== "decorated_definition") {
    return { definition: statement, decorators: [] };
  }
  const decorators = namedChildrenOf(statement)
    .filter((child) => child.type === "decorator")
    .map((decorator) => decorator.text.replace(/^@\s*/, "").trim());
  return { definition: statement.childForFieldName("definition"), decorators };
}

/**
 * Positional base class expressions; keyword arguments such as `metaclass=` are skipped.
 */
function superclassesOf(classNode: SyntaxNode): string[] {
  const argumentList = classNode.childForFieldName("superclasses");
  if (!argumentList) return [];
  return namedChildrenOf(argumentList)
    .filter(
      (child) =>
        child.type !== "keyword_argument" &&
        child.type !== "comment" &&
        child.type !== "list_splat" &&
        child.type !== "dictionary_splat"
    )
    .map((child) => child.text);
}

/**
 * Positional-or-keyword parameter names. Positional-only names before `/` are
 * dropped, and collection stops at `*`, `*args` or `**kwargs`.
 */
function parameterNames(parameters: SyntaxNode | null): string[] {
  if (!parameters) return [];

  let names: string[] = [];
  for (const child of namedChildrenOf(parameters)) {
    switch (child.type) {
      case "identifier":
        names.push(child.text);
        break;
      case "default_parameter":
      case "typed_default_parameter": {
        const name = child.childForFieldName("name");
        if (name) names.push(name.text);
        break;
      }
      case "typed_parameter": {
        const inner = namedChildrenOf(child)[0];
        if (!inner || inner.type !== "identifier") return names;
        names.push(inner.text);
        break;
      }
      case "positional_separator":
        names = [];
        break;
      case "list_splat_pattern":
      case "dictionary_splat_pattern":
      case "keyword_separator":
        return names;
      default:
        break;
    }
  }
  return names;
}

/**
 * Imported module identifiers anywhere in the file, in source order.
 * `from __future__ import ...` is a compiler directive and is skipped.
 */
function collectImports(root: SyntaxNode): string[] {
  const imports: string[] = [];
  walk(root, (node) => {
    if (node.type === "import_statement") {
      for (const child of namedChildrenOf(node)) {
        if (child.type === "dotted_name") {
          imports.push(child.text);
        } else if (child.type === "aliased_import") {
          const name = child.childForFieldName("name");
          if (name) imports.push(name.text);
        }
      }
      return false;
    }
    if (node.type === "import_from_statement") {
      const moduleName = node.childForFieldName("module_name");
      if (moduleName) imports.push(moduleName.text.replace(/\s+/g, ""));
      return false;
    }
    return node.type !== "future_import_statement";
  });
  return imports;
}

function describeError(node: SyntaxNode): string {
  if (node.isMissing) {
    return `missing ${node.type}`;
  }
  const snippet = node.text.split("\n")[0] ?? "";
  return snippet.length > 0
    ? `invalid syntax near '${snippet.slice(0, MAX_ERROR_SNIPPET)}'`
    : "invalid syntax";
}

// =============================================================================
// Factory Function
// =============================================================================

export function createEntityExtractor(parser: ParserManager): EntityExtractor {
  return new EntityExtractor(parser);
}
