const LIST_ITEM = /^(?:[-*]|\d+[.)])/;

/**
 * Pull list items out of free-text model output.
 *
 * Lines starting with "-", "*" or "1." / "1)" become items; when the text
 * has no such lines the whole response is returned as a single item.
 */
export function parseRecommendations(text: string): string[] {
  const items: string[] = [];

  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();
    if (!LIST_ITEM.test(line)) {
      continue;
    }
    const item = line.replace(/^[-* ]+/, '').replace(/^[0-9.) ]+/, '');
    if (item) {
      items.push(item);
    }
  }

  if (items.length > 0) {
    return items;
  }

  const whole = text.trim();
  return whole ? [whole] : [];
}
