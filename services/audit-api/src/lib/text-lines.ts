/**
 * Text Line Reconstruction
 */

export interface PositionedText {
  str: string;
  /** PDF transform matrix; [4] is x, [5] is y */
  transform: number[];
}

/**
 * Group text items by Y position so each visual line becomes one text line,
 * top to bottom, items left to right.
 */
export function joinTextItems(items: PositionedText[]): string {
  const itemsByY = new Map<number, Array<{ x: number; str: string }>>();

  for (const item of items) {
    if (!item.str || item.str.trim() === '') continue;

    // Text on the same visual line may have slight Y variations
    const y = Math.round(item.transform[5]);
    const x = Math.round(item.transform[4]);

    const line = itemsByY.get(y) ?? [];
    line.push({ x, str: item.str });
    itemsByY.set(y, line);
  }

  const lines: string[] = [];
  for (const y of [...itemsByY.keys()].sort((a, b) => b - a)) {
    const lineText = (itemsByY.get(y) ?? [])
      .sort((a, b) => a.x - b.x)
      .map((item) => item.str)
      .join(' ')
      .trim();
    if (lineText) {
      lines.push(lineText);
    }
  }

  return lines.join('\n');
}
