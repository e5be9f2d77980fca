/**
 * `baseLabel`, or `baseLabel_1`, `baseLabel_1_1`, ... until its key is not
 * taken. Keys are the form labels must be unique in, e.g. the saved token.
 */
export function getUniqueLabel(
    baseLabel: string,
    takenKeys: ReadonlySet<string>,
    toKey: (label: string) => string = (label: string) => label
): string {
    if (!takenKeys.has(toKey(baseLabel))) {
        return baseLabel
    }
    return getUniqueLabel(`${baseLabel}_1`, takenKeys, toKey)
}
