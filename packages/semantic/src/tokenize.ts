/**
 * Lower-case a text and split it into words on runs of whitespace
 *
 * @example
 * tokenize('Comfortable  Running\nShoes'); // ['comfortable', 'running', 'shoes']
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/\s+/)
    .filter((token) => token.length > 0);
}
