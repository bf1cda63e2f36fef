// Output artifact: notices header, merged imports, each annotated declaration in emission order, then export aliases.

import ts from "typescript";

import type { MergedAlias, MergedDeclaration, MergedImport, MergedUnit } from "./model/schema.js";

export function serializeMergedUnit(unit: MergedUnit, noticesHeader: string): string {
  const sections: string[] = [];
  if (noticesHeader.trim().length > 0) sections.push(noticesHeader.trim());

  const imports = unit.imports.flatMap(formatImport);
  if (imports.length > 0) sections.push(imports.join("\n"));

  for (const declaration of unit.declarations) {
    sections.push(formatDeclaration(declaration));
  }

  const aliases = formatAliases(unit.aliases, unit.declarations);
  if (aliases.length > 0) sections.push(aliases.join("\n"));

  return sections.length > 0 ? `${sections.join("\n\n")}\n` : "";
}

export function formatImport(item: MergedImport): string[] {
  const lines: string[] = [];
  const from = JSON.stringify(item.specifier);

  for (const local of item.namespaceLocals) {
    lines.push(`import * as ${local} from ${from};`);
  }

  const named = item.named.map((binding) => {
    const prefix = binding.typeOnly ? "type " : "";
    return binding.imported === binding.local
      ? `${prefix}${binding.local}`
      : `${prefix}${binding.imported} as ${binding.local}`;
  });
  const clauses = [
    ...(item.defaultLocal ? [item.defaultLocal] : []),
    ...(named.length > 0 ? [`{ ${named.join(", ")} }`] : []),
  ];
  if (clauses.length > 0) {
    lines.push(`import ${clauses.join(", ")} from ${from};`);
  }

  if (lines.length === 0 && item.sideEffect) {
    lines.push(`import ${from};`);
  }
  return lines;
}

// `export` goes after any leading doc comment so the comment stays attached to the declaration.
export function formatDeclaration(declaration: Pick<MergedDeclaration, "annotation" | "text" | "exported">): string {
  let text = declaration.text;
  if (declaration.exported) {
    const comments = ts.getLeadingCommentRanges(text, 0) ?? [];
    const last = comments[comments.length - 1];
    let insertAt = last ? last.end : 0;
    while (insertAt < text.length && /\s/.test(text.charAt(insertAt))) insertAt += 1;
    text = `${text.slice(0, insertAt)}export ${text.slice(insertAt)}`;
  }
  return declaration.annotation ? `${declaration.annotation}\n${text}` : text;
}

// Aliases whose target did not survive optimization are dropped with it.
export function formatAliases(
  aliases: readonly MergedAlias[],
  declarations: readonly Pick<MergedDeclaration, "id" | "name">[],
): string[] {
  const nameOf = new Map(declarations.map((declaration) => [declaration.id, declaration.name]));
  return aliases.flatMap((alias) => {
    const target = nameOf.get(alias.target);
    return target === undefined ? [] : [`export { ${target} as ${alias.name} };`];
  });
}
