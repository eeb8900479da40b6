/**
 * @file optionparsing.ts
 * Small sub-grammars shared by several extractors: option-letter strings
 * folded into bitmasks and `mode:` attribute lists.
 */

//#region Option Letters

/**
 * Effect of one option letter: bits to set, or a `[set, clear]` pair.
 */
export type OptionEffect = number | readonly [set: number, clear: number];

export type OptionTable = Readonly<Record<string, OptionEffect>>;

/**
 * Fold every character of `text` into a bitmask using `table`.
 * Characters missing from the table are passed to `onUnknown` and skipped.
 */
export function foldOptionChars(
    text: string,
    table: OptionTable,
    onUnknown: (c: string) => void,
    initial: number = 0
): number {
    let bits = initial;
    for (const c of text) {
        if (!Object.prototype.hasOwnProperty.call(table, c)) {
            onUnknown(c);
            continue;
        }
        const effect = table[c];
        if (typeof effect === 'number') {
            bits |= effect;
        } else {
            bits = (bits | effect[0]) & ~effect[1];
        }
    }
    return bits;
}

/** Test a single bit */
export function hasBit(bits: number, flag: number): boolean {
    return (bits & flag) === flag;
}

//#endregion

//#region Control Mode Attributes

/**
 * Switches shared by `TractionControl` and `AntiLockBrakes`
 */
export interface ControlModeAttributes {
    isOn: boolean;
    noDashboard: boolean;
    noToggle: boolean;
}

export const DEFAULT_CONTROL_MODE: Readonly<ControlModeAttributes> = Object.freeze({
    isOn: true,
    noDashboard: false,
    noToggle: false,
});

/**
 * Apply one `mode: a & b & ...` token to `attrs`.
 * Returns false when the token is not a mode declaration.
 */
export function applyControlModeToken(token: string, attrs: ControlModeAttributes): boolean {
    const parts = token.split(':');
    if (parts.length !== 2 || parts[0].trim().toLowerCase() !== 'mode') {
        return false;
    }
    for (const raw of parts[1].split('&')) {
        const attr = raw.trim().toLowerCase();
        if (attr.startsWith('nodash')) {
            attrs.noDashboard = true;
        } else if (attr.startsWith('notoggle')) {
            attrs.noToggle = true;
        } else if (attr.startsWith('on')) {
            attrs.isOn = true;
        } else if (attr.startsWith('off')) {
            attrs.isOn = false;
        }
    }
    return true;
}

//#endregion
