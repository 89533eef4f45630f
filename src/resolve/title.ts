/**
 * Pull the quoted title out of a reference entry.
 * Curly quotes (“…”) take precedence over straight quotes ("…").
 *
 * `A. Author, “Drift Detection,” 2021.` → `Drift Detection,`
 */
export function extractQuotedTitle(citationText: string): string | null {
    const curly = citationText.match(/“([^”]+)”/);
    if (curly?.[1]) return curly[1];

    const straight = citationText.match(/"([^"]+)"/);
    if (straight?.[1]) return straight[1];

    return null;
}

/**
 * Split a title on non-word characters and keep tokens longer than `minLength`.
 * Letters and digits of any script count as word characters.
 */
export function titleTokens(title: string, minLength = 4): string[] {
    return title.split(/[^\p{L}\p{N}_]+/u).filter((token) => token.length > minLength);
}
