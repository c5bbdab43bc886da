/**
 * Values that open with a comparator or a "v" are malformed version tokens,
 * e.g. ">= 1.2", "v5.10.0".
 */
const MALFORMED_PREFIX = /^\s*(?:[<>=!~^]|v)/i;

const NOT_VERSION_CHAR = /[^\d._]/g;

export function isMalformedVersion(value: string): boolean {
    return MALFORMED_PREFIX.test(value);
}

/**
 * Reduce a comparator- or v-prefixed version to its bare token.
 * Well-formed values and null pass through; applying it twice equals applying it once.
 *
 * @example cleanVersion('>= 1.2_01') // '1.2_01'
 */
export function cleanVersion(value: string | null): string | null {
    if (value === null || !isMalformedVersion(value)) {
        return value;
    }
    return value.replace(NOT_VERSION_CHAR, '');
}

/**
 * Normalize a core-since indicator to a number.
 * Strings are cleaned like versions; anything unparsable becomes 0.
 */
export function cleanCore(value: number | string | null): number | null {
    if (value === null) return null;
    if (typeof value === 'number') {
        return Number.isFinite(value) ? value : 0;
    }

    const bare = (cleanVersion(value) ?? '').replace(/_/g, '').trim();
    if (bare === '') return 0;

    const parsed = Number(bare);
    return Number.isFinite(parsed) ? parsed : 0;
}

/**
 * Order two version strings.
 *
 * Decimal versions ("1.10", "0.005") compare as numbers; dotted versions
 * ("1.2.3", "v5.10.0") compare component-wise. Missing versions sort first.
 */
export function compareVersions(a: string | null, b: string | null): number {
    const left = toComparable(a);
    const right = toComparable(b);

    if (left === null || right === null) {
        return left === right ? 0 : left === null ? -1 : 1;
    }

    if (left.decimal !== null && right.decimal !== null) {
        return Math.sign(left.decimal - right.decimal);
    }

    const length = Math.max(left.parts.length, right.parts.length);
    for (let i = 0; i < length; i++) {
        const diff = (left.parts[i] ?? 0) - (right.parts[i] ?? 0);
        if (diff !== 0) return Math.sign(diff);
    }
    return 0;
}

interface ComparableVersion {
    /** Numeric value for decimal versions, null for dotted ones */
    decimal: number | null;
    parts: number[];
}

function toComparable(value: string | null): ComparableVersion | null {
    if (value === null) return null;

    const dotted = /^\s*v/i.test(value) || (value.match(/\./g) ?? []).length > 1;
    const bare = value.replace(NOT_VERSION_CHAR, '').replace(/_/g, '');
    if (bare === '') return null;

    const parts = bare.split('.').map((part) => (part === '' ? 0 : Number(part)));
    if (dotted) {
        return { decimal: null, parts };
    }

    const decimal = Number(bare);
    return { decimal: Number.isFinite(decimal) ? decimal : null, parts };
}
