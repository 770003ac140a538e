/**
 * Splits a description into its set of lower-cased, whitespace-separated tokens.
 * Punctuation stays attached to its word, so "mold." and "mold" are different tokens.
 */
export const tokenize = (text: string): Set<string> =>
    new Set(text.toLowerCase().split(/\s+/).filter(token => token.length > 0));

/**
 * Jaccard similarity of the token sets of two descriptions, in [0, 1].
 * This is lexical overlap only; "mixing" and "stirring" score 0.
 * @returns 0 when either description has no tokens.
 */
export const similarityScore = (a: string, b: string): number => {
    const tokensA = tokenize(a);
    const tokensB = tokenize(b);

    if (tokensA.size === 0 || tokensB.size === 0) {
        return 0;
    }

    let intersection = 0;
    for (const token of tokensA) {
        if (tokensB.has(token)) intersection++;
    }
    const union = tokensA.size + tokensB.size - intersection;

    return intersection / union;
};
