const PAGE_RANGE_PART = /^(?:(\d+)(?:\s*-\s*(\d*))?|-\s*(\d+))$/;

/**
 * Check a LibreOffice page selection such as "1-3,5", "2;4-6" or "3-".
 * Open ends ("3-", "-2") run to the last page or from the first.
 * An empty string selects every page.
 */
export function isValidPageRanges(pageRanges: string): boolean {
  const trimmed = pageRanges.trim();
  if (trimmed === '') return true;

  return trimmed.split(/[,;]/).every((part) => {
    const match = PAGE_RANGE_PART.exec(part.trim());
    if (!match) return false;

    const [, from, to, upTo] = match;
    if (upTo !== undefined) return Number(upTo) >= 1;

    const first = Number(from);
    if (to === '') return first >= 1;

    const last = to === undefined ? first : Number(to);
    return first >= 1 && last >= first;
  });
}
