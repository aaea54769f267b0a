/** One key per line; blank lines and `#` comments are skipped. */
export function extractPlaintext(text: string): string[] {
  const keys: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const stripped = line.trim();
    if (!stripped || stripped.startsWith("#")) continue;
    keys.push(stripped.startsWith("@") ? stripped.slice(1) : stripped);
  }
  return keys;
}
