// Constant folding.
// Folds literal-only arithmetic, string concatenation, strict equality, `!` and unary +/-.
// Results that are NaN, -0 or non-finite are left unfolded, as is any expression containing them.

import ts from "typescript";

import { logEngineEvent } from "../../../core/logger.js";
import type { MergedDeclaration, MergedUnit } from "../../model/schema.js";
import { applyReplacements, type TextReplacement } from "../../model/text-edit.js";
import type { OptimizationPass, PassContext } from "../types.js";

import { parseDeclarationText, rewriteDeclarations, unwrapParentheses } from "./rewrite.js";

export type ConstantValue = number | string | boolean | null;

type Folded = { value: ConstantValue };

const NUMERIC_OPERATORS = new Set<ts.SyntaxKind>([
  ts.SyntaxKind.MinusToken,
  ts.SyntaxKind.AsteriskToken,
  ts.SyntaxKind.SlashToken,
  ts.SyntaxKind.PercentToken,
  ts.SyntaxKind.AsteriskAsteriskToken,
]);

const FOLDABLE_BINARY_OPERATORS = new Set<ts.SyntaxKind>([
  ...NUMERIC_OPERATORS,
  ts.SyntaxKind.PlusToken,
  ts.SyntaxKind.EqualsEqualsEqualsToken,
  ts.SyntaxKind.ExclamationEqualsEqualsToken,
]);

const FOLDABLE_PREFIX_OPERATORS = new Set<ts.SyntaxKind>([
  ts.SyntaxKind.ExclamationToken,
  ts.SyntaxKind.MinusToken,
  ts.SyntaxKind.PlusToken,
]);

export class SimplifyExpressionsPass implements OptimizationPass {
  readonly name = "simplify-expressions" as const;

  async transform(unit: MergedUnit, ctx: PassContext): Promise<MergedUnit> {
    const result = await rewriteDeclarations(unit, ctx, simplifyDeclaration);
    logEngineEvent(ctx.logger, "pass.simplify.summary", { changed: result.changed });
    return result.unit;
  }
}

export function simplifyDeclaration(declaration: Pick<MergedDeclaration, "text" | "origin">): string {
  const sourceFile = parseDeclarationText(declaration);
  const replacements: TextReplacement[] = [];

  const visit = (node: ts.Node): void => {
    if (node.kind >= ts.SyntaxKind.FirstTypeNode && node.kind <= ts.SyntaxKind.LastTypeNode) return;
    if (isFoldableShape(node) && isFoldCandidate(node)) {
      const folded = evaluateConstant(node);
      if (folded) {
        const text = formatConstant(folded.value, node);
        if (text !== node.getText(sourceFile)) {
          replacements.push({ start: node.getStart(sourceFile), end: node.end, text });
        }
        return;
      }
    }
    ts.forEachChild(node, visit);
  };

  ts.forEachChild(sourceFile, visit);
  return replacements.length > 0 ? applyReplacements(declaration.text, replacements) : declaration.text;
}

export function evaluateConstant(node: ts.Expression): Folded | null {
  if (ts.isParenthesizedExpression(node)) return evaluateConstant(node.expression);
  if (ts.isNumericLiteral(node)) return checkNumber(Number(node.text));
  if (ts.isStringLiteral(node) || ts.isNoSubstitutionTemplateLiteral(node)) return { value: node.text };

  switch (node.kind) {
    case ts.SyntaxKind.TrueKeyword:
      return { value: true };
    case ts.SyntaxKind.FalseKeyword:
      return { value: false };
    case ts.SyntaxKind.NullKeyword:
      return { value: null };
  }

  if (ts.isPrefixUnaryExpression(node)) {
    const operand = evaluateConstant(node.operand);
    if (!operand) return null;
    const value = operand.value;
    switch (node.operator) {
      case ts.SyntaxKind.ExclamationToken:
        return typeof value === "boolean" ? { value: !value } : null;
      case ts.SyntaxKind.MinusToken:
        return typeof value === "number" ? checkNumber(-value) : null;
      case ts.SyntaxKind.PlusToken:
        return typeof value === "number" ? checkNumber(value) : null;
      default:
        return null;
    }
  }

  if (ts.isBinaryExpression(node)) {
    const operator = node.operatorToken.kind;
    if (!FOLDABLE_BINARY_OPERATORS.has(operator)) return null;
    const left = evaluateConstant(node.left);
    const right = left ? evaluateConstant(node.right) : null;
    if (!left || !right) return null;
    return foldBinary(operator, left.value, right.value);
  }

  return null;
}

// =============================================================================
// INTERNALS
// =============================================================================

function isFoldableShape(
  node: ts.Node,
): node is ts.BinaryExpression | ts.PrefixUnaryExpression | ts.ParenthesizedExpression {
  return ts.isBinaryExpression(node) || ts.isPrefixUnaryExpression(node) || ts.isParenthesizedExpression(node);
}

function isFoldCandidate(node: ts.Expression): boolean {
  const inner = unwrapParentheses(node);
  if (ts.isBinaryExpression(inner)) return FOLDABLE_BINARY_OPERATORS.has(inner.operatorToken.kind);
  if (ts.isPrefixUnaryExpression(inner)) {
    // A signed literal such as `-1` is already folded.
    if (inner === node && ts.isNumericLiteral(inner.operand)) return false;
    return FOLDABLE_PREFIX_OPERATORS.has(inner.operator);
  }
  return false;
}

function foldBinary(operator: ts.SyntaxKind, left: ConstantValue, right: ConstantValue): Folded | null {
  if (operator === ts.SyntaxKind.EqualsEqualsEqualsToken) return { value: left === right };
  if (operator === ts.SyntaxKind.ExclamationEqualsEqualsToken) return { value: left !== right };

  if (operator === ts.SyntaxKind.PlusToken) {
    if (typeof left === "string" && typeof right === "string") return { value: left + right };
    if (typeof left === "number" && typeof right === "number") return checkNumber(left + right);
    return null;
  }

  if (typeof left !== "number" || typeof right !== "number") return null;
  switch (operator) {
    case ts.SyntaxKind.MinusToken:
      return checkNumber(left - right);
    case ts.SyntaxKind.AsteriskToken:
      return checkNumber(left * right);
    case ts.SyntaxKind.SlashToken:
      return checkNumber(left / right);
    case ts.SyntaxKind.PercentToken:
      return checkNumber(left % right);
    case ts.SyntaxKind.AsteriskAsteriskToken:
      return checkNumber(left ** right);
    default:
      return null;
  }
}

function checkNumber(value: number): Folded | null {
  if (!Number.isFinite(value) || Object.is(value, -0)) return null;
  return { value };
}

function formatConstant(value: ConstantValue, node: ts.Node): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value !== "number") return String(value);

  const text = String(value);
  const parent = node.parent;
  const isAccessBase =
    (ts.isPropertyAccessExpression(parent) || ts.isElementAccessExpression(parent)) &&
    parent.expression === node;
  if (isAccessBase || (value < 0 && !acceptsBareNegative(node))) {
    return `(${text})`;
  }
  return text;
}

function acceptsBareNegative(node: ts.Node): boolean {
  const parent = node.parent;
  if (
    ts.isVariableDeclaration(parent) ||
    ts.isPropertyAssignment(parent) ||
    ts.isPropertyDeclaration(parent) ||
    ts.isParameter(parent) ||
    ts.isEnumMember(parent) ||
    ts.isReturnStatement(parent) ||
    ts.isExpressionStatement(parent) ||
    ts.isArrayLiteralExpression(parent) ||
    ts.isParenthesizedExpression(parent) ||
    ts.isTemplateSpan(parent)
  ) {
    return true;
  }
  return (ts.isCallExpression(parent) || ts.isNewExpression(parent)) && parent.expression !== node;
}
