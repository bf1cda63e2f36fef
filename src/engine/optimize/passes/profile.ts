// Profiling pass: leaves text untouched and records size and coupling metrics per declaration.

import ts from "typescript";

import { logEngineEvent } from "../../../core/logger.js";
import type { DeclarationProfile, MergedUnit } from "../../model/schema.js";
import type { OptimizationPass, PassContext } from "../types.js";

import { countInbound } from "./dead-code.js";

export class ProfilePass implements OptimizationPass {
  readonly name = "profile" as const;

  async transform(unit: MergedUnit, ctx: PassContext): Promise<MergedUnit> {
    const inbound = countInbound(unit.declarations);
    const profile: DeclarationProfile[] = [];

    for (const declaration of unit.declarations) {
      ctx.signal.throwIfAborted();
      profile.push({
        id: declaration.id,
        name: declaration.name,
        characters: declaration.text.length,
        lines: declaration.text.split("\n").length,
        tokens: countTokens(declaration.text),
        inbound: inbound.get(declaration.id) ?? 0,
        outbound: declaration.dependsOn.filter((target) => target !== declaration.id).length,
      });
    }

    logEngineEvent(ctx.logger, "pass.profile.summary", {
      declarations: profile.length,
      characters: profile.reduce((total, item) => total + item.characters, 0),
    });
    return { ...unit, profile };
  }
}

// Scanner-level count; comments and whitespace are trivia and not counted.
export function countTokens(text: string): number {
  const scanner = ts.createScanner(ts.ScriptTarget.Latest, true, ts.LanguageVariant.Standard, text);
  let count = 0;
  while (scanner.scan() !== ts.SyntaxKind.EndOfFileToken) {
    count += 1;
  }
  return count;
}
