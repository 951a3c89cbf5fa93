/**
 * VSS datatypes and their value ranges.
 */

export const DATATYPES = [
    'double',
    'float',
    'int16',
    'int32',
    'int64',
    'int8',
    'uint16',
    'uint32',
    'uint64',
    'uint8',
    'boolean',
    'string',
] as const;

export type Datatype = typeof DATATYPES[number];

export type IntegerDatatype = Extract<Datatype, `int${string}` | `uint${string}`>;
export type NumericDatatype = IntegerDatatype | 'float' | 'double';

export type Bounds = readonly [low: number, high: number];

/**
 * Inclusive integer ranges. 64-bit limits are the nearest doubles, since
 * signal values are JS numbers.
 */
export const INT_BOUNDS: Readonly<Record<IntegerDatatype, Bounds>> = {
    uint8: [0, 2 ** 8 - 1],
    int8: [-(2 ** 7), 2 ** 7 - 1],
    uint16: [0, 2 ** 16 - 1],
    int16: [-(2 ** 15), 2 ** 15 - 1],
    uint32: [0, 2 ** 32 - 1],
    int32: [-(2 ** 31), 2 ** 31 - 1],
    uint64: [0, 2 ** 64 - 1],
    int64: [-(2 ** 63), 2 ** 63 - 1],
};

/** Largest finite IEEE 754 single-precision value. */
const FLOAT_MAX = 3.4028234663852886e38;

export const FLOAT_BOUNDS: Bounds = [-FLOAT_MAX, FLOAT_MAX];
export const DOUBLE_BOUNDS: Bounds = [-Number.MAX_VALUE, Number.MAX_VALUE];

/**
 * Parse a datatype name. VSS uses Pascal-cased names such as "UInt8" in
 * places, so matching is case-insensitive.
 */
export function parseDatatype(text: string): Datatype | undefined {
    const lowered = text.toLowerCase();
    return DATATYPES.find(datatype => datatype === lowered);
}

export function isIntegerDatatype(datatype: Datatype): datatype is IntegerDatatype {
    return datatype in INT_BOUNDS;
}

export function isNumericDatatype(datatype: Datatype): datatype is NumericDatatype {
    return datatype !== 'string' && datatype !== 'boolean';
}

export function datatypeBounds(datatype: NumericDatatype): Bounds {
    switch (datatype) {
        case 'float':
            return FLOAT_BOUNDS;
        case 'double':
            return DOUBLE_BOUNDS;
        default:
            return INT_BOUNDS[datatype];
    }
}
