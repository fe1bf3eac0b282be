/**
 * Compare two strings by Unicode code point rather than UTF-16 code unit, so
 * characters above U+FFFF sort after everything in the Basic Multilingual Plane.
 */
export function compareCodePoints(a: string, b: string): number {
    let i = 0;
    let j = 0;

    while (i < a.length && j < b.length) {
        const left = a.codePointAt(i) ?? 0;
        const right = b.codePointAt(j) ?? 0;
        if (left !== right) return left < right ? -1 : 1;
        i += left > 0xffff ? 2 : 1;
        j += right > 0xffff ? 2 : 1;
    }

    if (i < a.length) return 1;
    if (j < b.length) return -1;
    return 0;
}
