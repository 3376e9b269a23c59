export const graphemes = new Intl.Segmenter(undefined, { granularity: "grapheme" });

/** Code unit offsets at which a grapheme cluster starts, plus `text.length`. */
export function graphemeBoundaries(text: string): Set<number> {
  const out = new Set<number>([text.length]);
  for (const { index } of graphemes.segment(text)) out.add(index);
  return out;
}
