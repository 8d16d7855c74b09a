/**
 * "Did you mean" suggestions for font and template names.
 *
 * @module suggest
 */

/**
 * Edit distance between two strings (single-row Levenshtein).
 */
export function levenshtein(a: string, b: string): number {
    let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
    for (let i = 1; i <= a.length; i++) {
        const current = [i];
        for (let j = 1; j <= b.length; j++) {
            const cost = a[i - 1] === b[j - 1] ? 0 : 1;
            current.push(Math.min(
                (previous[j] ?? 0) + 1,
                (current[j - 1] ?? 0) + 1,
                (previous[j - 1] ?? 0) + cost,
            ));
        }
        previous = current;
    }
    return previous[b.length] ?? 0;
}

/**
 * Candidates closest to `target`: substring matches first, then by edit
 * distance, ignoring anything more than `maxDistance` edits away.
 *
 * @param key - Normalizes names before comparison (case, spacing)
 */
export function closestMatches(
    target: string,
    candidates: readonly string[],
    limit = 5,
    key: (value: string) => string = value => value.toLowerCase(),
    maxDistance = 3,
): string[] {
    const wanted = key(target);
    return candidates
        .map(candidate => {
            const k = key(candidate);
            const contains = wanted !== '' && (k.includes(wanted) || wanted.includes(k));
            return { candidate, contains, distance: levenshtein(wanted, k) };
        })
        .filter(entry => entry.contains || entry.distance <= maxDistance)
        .sort((a, b) =>
            Number(b.contains) - Number(a.contains)
            || a.distance - b.distance
            || a.candidate.localeCompare(b.candidate))
        .slice(0, limit)
        .map(entry => entry.candidate);
}
