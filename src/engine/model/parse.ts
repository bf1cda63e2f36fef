// Source unit parsing.
// Purpose: turn one TypeScript/JavaScript file into top-level declarations with tokens, references and rewrite sites.
// Assumes paths are repository-relative POSIX paths; syntax errors reject the whole unit.

import path from "node:path";

import ts from "typescript";

import { ParseError } from "../errors.js";

import type {
  Declaration,
  DeclarationKind,
  DeclarationReference,
  DeclarationToken,
  ImportBinding,
  ReferenceSite,
  Repository,
  SourceUnit,
  TextSpan,
} from "./schema.js";

export const SOURCE_EXTENSIONS = [".ts", ".tsx", ".mts", ".cts", ".js", ".jsx", ".mjs", ".cjs"];

type RepositoryRef = Pick<Repository, "id">;

type TopLevelBinding = {
  target: string;
  specifier: string | null;
  namespace: boolean;
};

type DeclarationSource = {
  name: string;
  kind: DeclarationKind;
  nodes: ts.Node[];
  nameNode: ts.Identifier;
  ownNameNodes: Set<ts.Node>;
  statement: ts.Statement;
  prefix: string[] | null;
  includeDoc: boolean;
};

type UnitScope = {
  sourceFile: ts.SourceFile;
  content: string;
  bindings: Map<string, TopLevelBinding>;
  externalLocals: Set<string>;
  exportedNames: Set<string>;
  defaultExportName: string | null;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function parse(repository: RepositoryRef, unitPath: string, content: string): SourceUnit {
  const diagnostics = collectSyntaxErrors(unitPath, content);
  if (diagnostics.length > 0) {
    throw new ParseError(repository.id, unitPath, diagnostics);
  }

  const sourceFile = ts.createSourceFile(
    unitPath,
    content,
    ts.ScriptTarget.Latest,
    true,
    resolveScriptKind(unitPath),
  );

  const imports: ImportBinding[] = [];
  const sources: DeclarationSource[] = [];
  const exportedNames = new Set<string>();
  let defaultExportName: string | null = null;
  let skippedStatements = 0;

  const statements = sourceFile.statements;
  for (let i = 0; i < statements.length; i += 1) {
    const statement = statements[i];
    if (!statement) continue;

    if (ts.isImportDeclaration(statement)) {
      imports.push(...collectImportBindings(statement));
      continue;
    }

    if (ts.isExportDeclaration(statement)) {
      if (!statement.moduleSpecifier && statement.exportClause && ts.isNamedExports(statement.exportClause)) {
        for (const element of statement.exportClause.elements) {
          const local = (element.propertyName ?? element.name).text;
          exportedNames.add(local);
          if (element.name.text === "default") defaultExportName = local;
        }
      } else {
        skippedStatements += 1;
      }
      continue;
    }

    if (ts.isExportAssignment(statement)) {
      if (!statement.isExportEquals && ts.isIdentifier(statement.expression)) {
        exportedNames.add(statement.expression.text);
        defaultExportName = statement.expression.text;
      } else {
        skippedStatements += 1;
      }
      continue;
    }

    if (ts.isFunctionDeclaration(statement) && statement.name) {
      // Overload signatures travel with their implementation.
      const name = statement.name.text;
      const run: ts.FunctionDeclaration[] = [statement];
      while (!run[run.length - 1]?.body) {
        const next = statements[i + 1];
        if (!next || !ts.isFunctionDeclaration(next) || next.name?.text !== name) break;
        run.push(next);
        i += 1;
      }
      const last = run[run.length - 1] ?? statement;
      const ownNameNodes = new Set<ts.Node>();
      for (const fn of run) {
        if (fn.name) ownNameNodes.add(fn.name);
      }
      sources.push({
        name,
        kind: "function",
        nodes: run,
        nameNode: last.name ?? statement.name,
        ownNameNodes,
        statement,
        prefix: null,
        includeDoc: true,
      });
      continue;
    }

    const single = describeSingleDeclaration(statement);
    if (single) {
      sources.push(single);
      continue;
    }

    if (ts.isVariableStatement(statement)) {
      const variables = describeVariableStatement(statement, sourceFile);
      if (variables) {
        sources.push(...variables);
        continue;
      }
    }

    skippedStatements += 1;
  }

  const bindings = new Map<string, TopLevelBinding>();
  const externalLocals = new Set<string>();
  for (const binding of imports) {
    if (!binding.local) continue;
    if (binding.relative) {
      bindings.set(binding.local, {
        target: binding.imported ?? binding.local,
        specifier: binding.specifier,
        namespace: binding.kind === "namespace",
      });
    } else {
      externalLocals.add(binding.local);
    }
  }
  for (const source of sources) {
    bindings.set(source.name, { target: source.name, specifier: null, namespace: false });
    if (hasModifier(source.statement, ts.SyntaxKind.DefaultKeyword)) {
      defaultExportName = source.name;
    }
  }

  const scope: UnitScope = {
    sourceFile,
    content,
    bindings,
    externalLocals,
    exportedNames,
    defaultExportName,
  };

  const declarations = sources.map((source) => buildDeclaration(repository, unitPath, scope, source));

  return {
    path: unitPath,
    repositoryId: repository.id,
    declarations,
    imports,
    skippedStatements,
  };
}

export function isSourcePath(filePath: string): boolean {
  if (/\.d\.[cm]?ts$/.test(filePath)) return false;
  return SOURCE_EXTENSIONS.includes(path.extname(filePath));
}

// =============================================================================
// SYNTAX CHECK
// =============================================================================

function collectSyntaxErrors(unitPath: string, content: string): string[] {
  const result = ts.transpileModule(content, {
    fileName: unitPath,
    reportDiagnostics: true,
    compilerOptions: {
      target: ts.ScriptTarget.ES2022,
      module: ts.ModuleKind.ESNext,
      jsx: ts.JsxEmit.Preserve,
      allowJs: true,
    },
  });

  return (result.diagnostics ?? [])
    .filter((diagnostic) => diagnostic.category === ts.DiagnosticCategory.Error)
    .map((diagnostic) => {
      const message = ts.flattenDiagnosticMessageText(diagnostic.messageText, " ");
      if (diagnostic.file && diagnostic.start !== undefined) {
        const { line, character } = diagnostic.file.getLineAndCharacterOfPosition(diagnostic.start);
        return `${line + 1}:${character + 1} ${message}`;
      }
      return message;
    });
}

export function resolveScriptKind(unitPath: string): ts.ScriptKind {
  switch (path.extname(unitPath)) {
    case ".tsx":
      return ts.ScriptKind.TSX;
    case ".jsx":
      return ts.ScriptKind.JSX;
    case ".js":
    case ".mjs":
    case ".cjs":
      return ts.ScriptKind.JS;
    default:
      return ts.ScriptKind.TS;
  }
}

// =============================================================================
// STATEMENT CLASSIFICATION
// =============================================================================

function describeSingleDeclaration(statement: ts.Statement): DeclarationSource | null {
  const describe = (kind: DeclarationKind, nameNode: ts.Identifier): DeclarationSource => ({
    name: nameNode.text,
    kind,
    nodes: [statement],
    nameNode,
    ownNameNodes: new Set<ts.Node>([nameNode]),
    statement,
    prefix: null,
    includeDoc: true,
  });

  if (ts.isClassDeclaration(statement) && statement.name) {
    return describe("class", statement.name);
  }
  if (ts.isInterfaceDeclaration(statement)) {
    return describe("interface", statement.name);
  }
  if (ts.isTypeAliasDeclaration(statement)) {
    return describe("type", statement.name);
  }
  if (ts.isEnumDeclaration(statement)) {
    return describe("enum", statement.name);
  }
  return null;
}

function describeVariableStatement(
  statement: ts.VariableStatement,
  sourceFile: ts.SourceFile,
): DeclarationSource[] | null {
  const declarators = statement.declarationList.declarations;
  const named: Array<{ declarator: ts.VariableDeclaration; name: ts.Identifier }> = [];
  for (const declarator of declarators) {
    if (!ts.isIdentifier(declarator.name)) return null;
    named.push({ declarator, name: declarator.name });
  }

  const first = named[0];
  if (named.length === 1 && first) {
    return [
      {
        name: first.name.text,
        kind: "variable",
        nodes: [statement],
        nameNode: first.name,
        ownNameNodes: new Set<ts.Node>([first.name]),
        statement,
        prefix: null,
        includeDoc: true,
      },
    ];
  }

  const modifiers = (ts.getModifiers(statement) ?? [])
    .filter((modifier) => !isExportModifier(modifier))
    .map((modifier) => modifier.getText(sourceFile));
  const prefix = [...modifiers, variableKeyword(statement.declarationList)];

  return named.map(({ declarator, name }, index) => ({
    name: name.text,
    kind: "variable" as const,
    nodes: [declarator],
    nameNode: name,
    ownNameNodes: new Set<ts.Node>([name]),
    statement,
    prefix,
    includeDoc: index === 0,
  }));
}

function variableKeyword(list: ts.VariableDeclarationList): string {
  if (list.flags & ts.NodeFlags.Const) return "const";
  if (list.flags & ts.NodeFlags.Let) return "let";
  return "var";
}

function isExportModifier(modifier: ts.ModifierLike): boolean {
  return modifier.kind === ts.SyntaxKind.ExportKeyword || modifier.kind === ts.SyntaxKind.DefaultKeyword;
}

function isExportKeywordToken(node: ts.Node): boolean {
  if (node.kind !== ts.SyntaxKind.ExportKeyword && node.kind !== ts.SyntaxKind.DefaultKeyword) return false;
  return node.parent !== undefined && ts.canHaveModifiers(node.parent);
}

function hasModifier(statement: ts.Statement, kind: ts.SyntaxKind): boolean {
  if (!ts.canHaveModifiers(statement)) return false;
  return (ts.getModifiers(statement) ?? []).some((modifier) => modifier.kind === kind);
}

// =============================================================================
// IMPORTS
// =============================================================================

function collectImportBindings(statement: ts.ImportDeclaration): ImportBinding[] {
  if (!ts.isStringLiteral(statement.moduleSpecifier)) return [];

  const specifier = statement.moduleSpecifier.text;
  const relative = specifier.startsWith(".") || specifier.startsWith("/");
  const clause = statement.importClause;

  if (!clause) {
    return [{ kind: "side-effect", local: null, imported: null, specifier, relative, typeOnly: false }];
  }

  const bindings: ImportBinding[] = [];
  if (clause.name) {
    bindings.push({
      kind: "default",
      local: clause.name.text,
      imported: "default",
      specifier,
      relative,
      typeOnly: clause.isTypeOnly,
    });
  }

  const named = clause.namedBindings;
  if (named && ts.isNamespaceImport(named)) {
    bindings.push({
      kind: "namespace",
      local: named.name.text,
      imported: "*",
      specifier,
      relative,
      typeOnly: clause.isTypeOnly,
    });
  } else if (named) {
    for (const element of named.elements) {
      bindings.push({
        kind: "named",
        local: element.name.text,
        imported: (element.propertyName ?? element.name).text,
        specifier,
        relative,
        typeOnly: clause.isTypeOnly || element.isTypeOnly,
      });
    }
  }

  return bindings;
}

// =============================================================================
// DECLARATION EXTRACTION
// =============================================================================

function buildDeclaration(
  repository: RepositoryRef,
  unitPath: string,
  scope: UnitScope,
  source: DeclarationSource,
): Declaration {
  const { sourceFile, content } = scope;
  const firstNode = source.nodes[0] ?? source.statement;
  const lastNode = source.nodes[source.nodes.length - 1] ?? firstNode;

  const bodyStart = firstNode.getStart(sourceFile);
  const statementStart = source.statement.getStart(sourceFile);
  const docStart = source.includeDoc ? leadingDocStart(content, source.statement) : null;

  const locals = collectLocalScopes(source.nodes, source.ownNameNodes);
  const walk = walkDeclaration(source, scope, locals);

  // Text is assembled from kept source ranges; offsets are remapped through the same ranges.
  const pieces: Array<{ from: number; to: number; at: number }> = [];
  let text = "";
  let tokens: DeclarationToken[] = walk.tokens;

  if (source.prefix !== null) {
    if (docStart !== null) {
      text += content.slice(docStart, statementStart);
    }
    text += `${source.prefix.join(" ")} `;
    pieces.push({ from: bodyStart, to: lastNode.end, at: text.length });
    text += `${content.slice(bodyStart, lastNode.end)};`;
    tokens = [
      ...source.prefix.map((word) => ({ text: word, binding: false })),
      ...walk.tokens,
      { text: ";", binding: false },
    ];
  } else {
    let cursor = docStart ?? bodyStart;
    for (const range of collectExportModifierRanges(source.nodes, sourceFile, content)) {
      pieces.push({ from: cursor, to: range.start, at: text.length });
      text += content.slice(cursor, range.start);
      cursor = range.end;
    }
    pieces.push({ from: cursor, to: lastNode.end, at: text.length });
    text += content.slice(cursor, lastNode.end);
  }

  const mapOffset = (offset: number): number => {
    for (const piece of pieces) {
      if (offset >= piece.from && offset <= piece.to) {
        return piece.at + (offset - piece.from);
      }
    }
    throw new Error(`Offset ${offset} falls outside declaration ${source.name}.`);
  };

  const sites: ReferenceSite[] = walk.sites.map((site) => ({
    ...site,
    start: mapOffset(site.start),
    end: mapOffset(site.end),
  }));
  const nameSite: TextSpan = {
    start: mapOffset(source.nameNode.getStart(sourceFile)),
    end: mapOffset(source.nameNode.end),
  };

  return {
    name: source.name,
    kind: source.kind,
    text,
    start: bodyStart,
    exported:
      hasModifier(source.statement, ts.SyntaxKind.ExportKeyword) || scope.exportedNames.has(source.name),
    defaultExport: scope.defaultExportName === source.name,
    nameSite,
    references: walk.references,
    sites,
    externalUses: walk.externalUses,
    tokens,
    unitPath,
    repositoryId: repository.id,
  };
}

function leadingDocStart(content: string, statement: ts.Statement): number | null {
  const ranges = ts.getLeadingCommentRanges(content, statement.pos) ?? [];
  const last = ranges[ranges.length - 1];
  if (!last || last.kind !== ts.SyntaxKind.MultiLineCommentTrivia) return null;
  return content.startsWith("/**", last.pos) ? last.pos : null;
}

function collectExportModifierRanges(
  nodes: ts.Node[],
  sourceFile: ts.SourceFile,
  content: string,
): TextSpan[] {
  const ranges: TextSpan[] = [];
  for (const node of nodes) {
    if (!ts.canHaveModifiers(node)) continue;
    for (const modifier of ts.getModifiers(node) ?? []) {
      if (!isExportModifier(modifier)) continue;
      let end = modifier.end;
      while (end < content.length && /\s/.test(content.charAt(end))) end += 1;
      ranges.push({ start: modifier.getStart(sourceFile), end });
    }
  }
  return ranges.sort((a, b) => a.start - b.start);
}

// =============================================================================
// AST WALK
// =============================================================================

type WalkResult = {
  tokens: DeclarationToken[];
  sites: ReferenceSite[];
  references: DeclarationReference[];
  externalUses: string[];
};

type IdentifierRole = "property" | "declaration-name" | "usage";

// Local name -> the nodes whose extent that local binding covers.
type LocalScopes = Map<string, ts.Node[]>;

function walkDeclaration(source: DeclarationSource, scope: UnitScope, locals: LocalScopes): WalkResult {
  const { sourceFile } = scope;
  const tokens: DeclarationToken[] = [];
  const sites: ReferenceSite[] = [];
  const references = new Map<string, DeclarationReference>();
  const externalUses = new Set<string>();

  const isShadowed = (node: ts.Identifier): boolean =>
    (locals.get(node.text) ?? []).some((owner) => owner.pos <= node.pos && node.end <= owner.end);

  const visitTokens = (node: ts.Node): void => {
    if (node.kind >= ts.SyntaxKind.FirstJSDocNode && node.kind <= ts.SyntaxKind.LastJSDocNode) return;
    if (isExportKeywordToken(node)) return;

    const children = node.getChildren(sourceFile);
    if (children.length > 0) {
      children.forEach(visitTokens);
      return;
    }

    const raw = node.getText(sourceFile);
    const text = node.kind === ts.SyntaxKind.JsxText ? raw.trim().replace(/\s+/g, " ") : raw;
    if (text.length === 0) return;

    if (ts.isIdentifier(node) || ts.isPrivateIdentifier(node)) {
      const role = ts.isIdentifier(node) ? classifyIdentifier(node) : "property";
      const binding =
        role === "declaration-name" || (role === "usage" && (locals.has(text) || scope.bindings.has(text)));
      tokens.push({ text, binding });
      return;
    }

    tokens.push({ text, binding: false });
  };

  const visitReferences = (node: ts.Node): void => {
    if (ts.isPropertyAccessExpression(node) && ts.isIdentifier(node.expression)) {
      const binding = scope.bindings.get(node.expression.text);
      if (binding?.namespace && !isShadowed(node.expression)) {
        const local = `${node.expression.text}.${node.name.text}`;
        if (!references.has(local)) {
          references.set(local, { local, target: node.name.text, specifier: binding.specifier });
        }
        sites.push({ name: local, start: node.getStart(sourceFile), end: node.end, shorthand: false });
        return;
      }
    }

    if (
      ts.isIdentifier(node) &&
      !source.ownNameNodes.has(node) &&
      classifyIdentifier(node) === "usage" &&
      !isShadowed(node)
    ) {
      const name = node.text;
      const binding = scope.bindings.get(name);
      if (binding && !binding.namespace) {
        if (!references.has(name)) {
          references.set(name, { local: name, target: binding.target, specifier: binding.specifier });
        }
        sites.push({
          name,
          start: node.getStart(sourceFile),
          end: node.end,
          shorthand: ts.isShorthandPropertyAssignment(node.parent),
        });
      } else if (!binding && scope.externalLocals.has(name)) {
        externalUses.add(name);
      }
    }

    ts.forEachChild(node, visitReferences);
  };

  for (const node of source.nodes) {
    visitTokens(node);
    visitReferences(node);
  }

  return {
    tokens,
    sites: sites.sort((a, b) => a.start - b.start),
    references: Array.from(references.values()),
    externalUses: Array.from(externalUses).sort(),
  };
}

function collectLocalScopes(nodes: ts.Node[], ownNameNodes: Set<ts.Node>): LocalScopes {
  const locals: LocalScopes = new Map();
  const visit = (node: ts.Node): void => {
    if (ts.isIdentifier(node) && !ownNameNodes.has(node) && classifyIdentifier(node) === "declaration-name") {
      const owners = locals.get(node.text) ?? [];
      owners.push(bindingScopeOf(node));
      locals.set(node.text, owners);
    }
    ts.forEachChild(node, visit);
  };
  nodes.forEach(visit);
  return locals;
}

// The node whose extent a local binding covers: its function for parameters and `var`,
// its block or loop for `let`/`const`, the expression itself for named function/class expressions.
function bindingScopeOf(name: ts.Identifier): ts.Node {
  let holder: ts.Node = name.parent;
  while (ts.isBindingElement(holder) || ts.isObjectBindingPattern(holder) || ts.isArrayBindingPattern(holder)) {
    holder = holder.parent;
  }

  if (ts.isParameter(holder)) return holder.parent;
  if (ts.isFunctionExpression(holder) || ts.isClassExpression(holder)) return holder;
  if (ts.isTypeParameterDeclaration(holder)) {
    const owner = holder.parent;
    if (ts.isInferTypeNode(owner)) return ts.findAncestor(owner, ts.isConditionalTypeNode) ?? owner;
    return owner;
  }
  if (ts.isVariableDeclaration(holder)) {
    const list = holder.parent;
    if (ts.isCatchClause(list)) return list;
    if (!(list.flags & ts.NodeFlags.BlockScoped)) {
      const owner = ts.findAncestor(list, (node) => ts.isFunctionLike(node) || ts.isClassStaticBlockDeclaration(node));
      return owner ?? list.parent;
    }
    return ts.isVariableStatement(list.parent) ? list.parent.parent : list.parent;
  }
  return holder.parent;
}

function classifyIdentifier(node: ts.Identifier): IdentifierRole {
  const parent = node.parent;
  if (!parent) return "usage";

  if (
    (ts.isPropertyAccessExpression(parent) && parent.name === node) ||
    (ts.isQualifiedName(parent) && parent.right === node) ||
    (ts.isMetaProperty(parent) && parent.name === node) ||
    (ts.isBindingElement(parent) && parent.propertyName === node) ||
    ts.isJsxAttribute(parent) ||
    ts.isLabeledStatement(parent) ||
    ts.isBreakOrContinueStatement(parent)
  ) {
    return "property";
  }

  if (
    (ts.isPropertyAssignment(parent) ||
      ts.isPropertyDeclaration(parent) ||
      ts.isPropertySignature(parent) ||
      ts.isMethodDeclaration(parent) ||
      ts.isMethodSignature(parent) ||
      ts.isGetAccessorDeclaration(parent) ||
      ts.isSetAccessorDeclaration(parent) ||
      ts.isEnumMember(parent)) &&
    parent.name === node
  ) {
    return "property";
  }

  if (
    (ts.isVariableDeclaration(parent) ||
      ts.isParameter(parent) ||
      ts.isFunctionDeclaration(parent) ||
      ts.isFunctionExpression(parent) ||
      ts.isClassDeclaration(parent) ||
      ts.isClassExpression(parent) ||
      ts.isInterfaceDeclaration(parent) ||
      ts.isTypeAliasDeclaration(parent) ||
      ts.isEnumDeclaration(parent) ||
      ts.isTypeParameterDeclaration(parent) ||
      ts.isBindingElement(parent)) &&
    parent.name === node
  ) {
    return "declaration-name";
  }

  return "usage";
}
