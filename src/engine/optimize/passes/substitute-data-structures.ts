// Data-structure substitution.
// Only exact shapes are rewritten:
//   x === a || x === b || x === c   ->  [a, b, c].includes(x)
//   x !== a && x !== b && x !== c   ->  ![a, b, c].includes(x)
//   Array.from(new Set(expr))       ->  [...new Set(expr)]

import ts from "typescript";

import { logEngineEvent } from "../../../core/logger.js";
import type { MergedDeclaration, MergedUnit } from "../../model/schema.js";
import { applyReplacements, type TextReplacement } from "../../model/text-edit.js";
import type { OptimizationPass, PassContext } from "../types.js";

import { parseDeclarationText, rewriteDeclarations } from "./rewrite.js";

const MIN_MEMBERSHIP_LITERALS = 3;

export class SubstituteDataStructuresPass implements OptimizationPass {
  readonly name = "substitute-data-structures" as const;

  async transform(unit: MergedUnit, ctx: PassContext): Promise<MergedUnit> {
    const unitNames = new Set<string>([
      ...unit.declarations.map((declaration) => declaration.name),
      ...unit.aliases.map((alias) => alias.name),
      ...unit.imports.flatMap((item) => [
        ...(item.defaultLocal ? [item.defaultLocal] : []),
        ...item.namespaceLocals,
        ...item.named.map((binding) => binding.local),
      ]),
    ]);
    const result = await rewriteDeclarations(unit, ctx, (declaration) =>
      substituteDeclaration(declaration, unitNames),
    );
    logEngineEvent(ctx.logger, "pass.substitute.summary", { changed: result.changed });
    return result.unit;
  }
}

export function substituteDeclaration(
  declaration: Pick<MergedDeclaration, "text" | "origin">,
  unitNames: ReadonlySet<string> = new Set(),
): string {
  const sourceFile = parseDeclarationText(declaration);
  const shadowed = new Set<string>([...unitNames, ...collectBoundNames(sourceFile)]);
  const builtinsAvailable = !shadowed.has("Array") && !shadowed.has("Set");
  const replacements: TextReplacement[] = [];

  const visit = (node: ts.Node): void => {
    if (ts.isBinaryExpression(node)) {
      const membership = matchMembershipChain(node, sourceFile);
      if (membership) {
        replacements.push({ start: node.getStart(sourceFile), end: node.end, text: membership });
        return;
      }
    }

    if (builtinsAvailable && ts.isCallExpression(node)) {
      const spread = matchArrayFromSet(node, sourceFile);
      if (spread) {
        replacements.push({ start: node.getStart(sourceFile), end: node.end, text: spread });
        return;
      }
    }

    ts.forEachChild(node, visit);
  };

  ts.forEachChild(sourceFile, visit);
  return replacements.length > 0 ? applyReplacements(declaration.text, replacements) : declaration.text;
}

// =============================================================================
// PATTERNS
// =============================================================================

function matchMembershipChain(node: ts.BinaryExpression, sourceFile: ts.SourceFile): string | null {
  const chain = node.operatorToken.kind;
  let comparison: ts.SyntaxKind;
  if (chain === ts.SyntaxKind.BarBarToken) {
    comparison = ts.SyntaxKind.EqualsEqualsEqualsToken;
  } else if (chain === ts.SyntaxKind.AmpersandAmpersandToken) {
    comparison = ts.SyntaxKind.ExclamationEqualsEqualsToken;
  } else {
    return null;
  }

  const operands = flattenChain(node, chain);
  if (operands.length < MIN_MEMBERSHIP_LITERALS) return null;

  let subject: string | null = null;
  const literals: string[] = [];
  for (const operand of operands) {
    if (!ts.isBinaryExpression(operand) || operand.operatorToken.kind !== comparison) return null;
    if (!ts.isIdentifier(operand.left) || !isMembershipLiteral(operand.right)) return null;
    if (subject !== null && operand.left.text !== subject) return null;
    subject = operand.left.text;
    literals.push(operand.right.getText(sourceFile));
  }
  if (subject === null) return null;

  const call = `[${literals.join(", ")}].includes(${subject})`;
  return chain === ts.SyntaxKind.BarBarToken ? call : `!${call}`;
}

function flattenChain(node: ts.Expression, operator: ts.SyntaxKind): ts.Expression[] {
  if (ts.isBinaryExpression(node) && node.operatorToken.kind === operator) {
    return [...flattenChain(node.left, operator), ...flattenChain(node.right, operator)];
  }
  return [node];
}

function isMembershipLiteral(node: ts.Expression): boolean {
  return ts.isStringLiteral(node) || ts.isNumericLiteral(node);
}

function matchArrayFromSet(node: ts.CallExpression, sourceFile: ts.SourceFile): string | null {
  const callee = node.expression;
  if (
    !ts.isPropertyAccessExpression(callee) ||
    !ts.isIdentifier(callee.expression) ||
    callee.expression.text !== "Array" ||
    callee.name.text !== "from" ||
    node.typeArguments ||
    node.arguments.length !== 1
  ) {
    return null;
  }

  const argument = node.arguments[0];
  if (
    !argument ||
    !ts.isNewExpression(argument) ||
    !ts.isIdentifier(argument.expression) ||
    argument.expression.text !== "Set" ||
    (argument.arguments?.length ?? 0) > 1
  ) {
    return null;
  }

  return `[...${argument.getText(sourceFile)}]`;
}

// Names declared anywhere inside the declaration; a local `Set` or `Array` disables the rewrite.
function collectBoundNames(sourceFile: ts.SourceFile): Set<string> {
  const names = new Set<string>();
  const visit = (node: ts.Node): void => {
    if (
      (ts.isVariableDeclaration(node) ||
        ts.isParameter(node) ||
        ts.isBindingElement(node) ||
        ts.isFunctionDeclaration(node) ||
        ts.isClassDeclaration(node) ||
        ts.isClassExpression(node) ||
        ts.isFunctionExpression(node)) &&
      node.name &&
      ts.isIdentifier(node.name)
    ) {
      names.add(node.name.text);
    }
    ts.forEachChild(node, visit);
  };
  ts.forEachChild(sourceFile, visit);
  return names;
}
