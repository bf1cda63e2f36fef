// Offsets are into the original text; replacements must not overlap.
export type TextReplacement = {
  start: number;
  end: number;
  text: string;
};

export function applyReplacements(text: string, replacements: readonly TextReplacement[]): string {
  let output = text;
  for (const replacement of [...replacements].sort((a, b) => b.start - a.start)) {
    output = output.slice(0, replacement.start) + replacement.text + output.slice(replacement.end);
  }
  return output;
}
