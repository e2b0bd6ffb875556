export function truncateMiddle(s: string, max = 300): string {
  if (s.length <= max) return s;
  const half = Math.floor((max - 3) / 2);
  return s.slice(0, half) + '...' + s.slice(-half);
}

export function preview(o: unknown, max = 300): string {
  const s = typeof o === 'string' ? o : JSON.stringify(o) ?? String(o);
  return s.length > max ? s.slice(0, max) + '…' : s;
}

export function containsAny(haystack: string, needles: readonly string[]): boolean {
  return needles.some(n => haystack.includes(n));
}
