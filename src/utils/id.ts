export interface SessionIdParts {
  yyyyMMdd: string; // YYYYMMDD
  nnn: string; // 3 digits
}

export function formatSessionId(parts: SessionIdParts): string {
  return `s-${parts.yyyyMMdd}-${parts.nnn}`;
}

export function parseSessionId(sessionId: string): SessionIdParts | null {
  const m = /^s-(\d{8})-(\d{3})$/.exec(sessionId);
  if (!m) return null;
  return { yyyyMMdd: m[1], nnn: m[2] };
}

/**
 * Next free session id for `now`'s UTC date, one past the highest sequence
 * number already used that day. Ids that do not parse are ignored.
 */
export function nextSessionId(existing: Iterable<string>, now: Date = new Date()): string {
  const yyyyMMdd = formatDate(now);
  let max = 0;
  for (const id of existing) {
    const parts = parseSessionId(id);
    if (!parts || parts.yyyyMMdd !== yyyyMMdd) continue;
    max = Math.max(max, Number.parseInt(parts.nnn, 10));
  }
  if (max >= 999) throw new Error(`Session ids exhausted for ${yyyyMMdd}`);
  return formatSessionId({ yyyyMMdd, nnn: String(max + 1).padStart(3, '0') });
}

function formatDate(d: Date): string {
  const yyyy = d.getUTCFullYear();
  const mm = String(d.getUTCMonth() + 1).padStart(2, '0');
  const dd = String(d.getUTCDate()).padStart(2, '0');
  return `${yyyy}${mm}${dd}`;
}
