// Shared plumbing for passes that rewrite declaration text through the TypeScript AST.

import ts from "typescript";

import { mapWithConcurrency } from "../../../core/pool.js";
import { resolveScriptKind } from "../../model/parse.js";
import type { MergedDeclaration, MergedUnit } from "../../model/schema.js";
import type { PassContext } from "../types.js";

const DECLARATION_CONCURRENCY = 8;

export function parseDeclarationText(declaration: Pick<MergedDeclaration, "text" | "origin">): ts.SourceFile {
  return ts.createSourceFile(
    declaration.origin.unitPath,
    declaration.text,
    ts.ScriptTarget.Latest,
    true,
    resolveScriptKind(declaration.origin.unitPath),
  );
}

// Rewrites declarations independently; the pool yields between declarations and stops once the signal aborts.
export async function rewriteDeclarations(
  unit: MergedUnit,
  ctx: PassContext,
  rewrite: (declaration: MergedDeclaration) => string,
): Promise<{ unit: MergedUnit; changed: number }> {
  let changed = 0;
  const declarations = await mapWithConcurrency(
    unit.declarations,
    DECLARATION_CONCURRENCY,
    (declaration) => {
      const text = rewrite(declaration);
      if (text === declaration.text) return declaration;
      changed += 1;
      return { ...declaration, text };
    },
    ctx.signal,
  );
  return { unit: { ...unit, declarations }, changed };
}

export function unwrapParentheses(node: ts.Expression): ts.Expression {
  let current = node;
  while (ts.isParenthesizedExpression(current)) current = current.expression;
  return current;
}
