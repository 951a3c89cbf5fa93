/**
 * Vehicle Signal Specification signals.
 */

import {
    datatypeBounds,
    isIntegerDatatype,
    isNumericDatatype,
    parseDatatype,
    type Datatype,
} from './datatypes.js';
import { SignalDefinitionError, SignalValueError, UnitError } from './errors.js';
import { leafSchema, type SignalType, type SignalValue } from './schema.js';
import { DIMENSIONLESS, registry as defaultRegistry, type UnitRegistry, type VssUnit } from './units.js';

/** Everything a leaf declares, plus where it lives. */
export interface SignalDefinition {
    namespace: readonly string[];
    type: SignalType;
    datatype: string;
    description: string;
    uuid: string;
    unit?: string;
    min?: number;
    max?: number;
    enum?: Iterable<string>;
    default?: SignalValue;
    comment?: string;
    deprecation?: string;
}

/** Plain form of a signal, as printed by `vss find --json`. */
export interface SignalJson {
    path: string;
    namespace: string[];
    type: SignalType;
    datatype: Datatype;
    unit: string;
    description: string;
    uuid: string;
    min?: number;
    max?: number;
    default?: SignalValue;
    enum?: string[];
    comment?: string;
    deprecation?: string;
}

/**
 * An immutable VSS leaf definition.
 *
 * Construction validates the definition: numeric bounds are narrowed to
 * what the datatype can hold, the default must fit the datatype and the
 * bounds, and the unit must parse (and be dimensionless for strings and
 * booleans).
 */
export class Signal {
    readonly namespace: readonly string[];
    readonly type: SignalType;
    readonly datatype: Datatype;
    readonly description: string;
    readonly uuid: string;
    readonly unit: string;
    readonly vssUnit: VssUnit;
    readonly min: number | undefined;
    readonly max: number | undefined;
    readonly default: SignalValue | undefined;
    readonly enum: ReadonlySet<string> | undefined;
    readonly comment: string | undefined;
    readonly deprecation: string | undefined;

    private readonly registry: UnitRegistry;

    /**
     * @throws SignalDefinitionError if the definition is inconsistent
     */
    constructor(definition: SignalDefinition, registry: UnitRegistry = defaultRegistry) {
        this.registry = registry;
        this.namespace = Object.freeze([...definition.namespace]);
        this.type = definition.type;
        this.description = definition.description;
        this.uuid = definition.uuid;
        this.comment = definition.comment;
        this.deprecation = definition.deprecation;

        const datatype = parseDatatype(definition.datatype);
        if (datatype === undefined) {
            throw new SignalDefinitionError(`unrecognized datatype ${definition.datatype}`);
        }
        this.datatype = datatype;

        if (definition.enum !== undefined) {
            if (datatype !== 'string') {
                throw new SignalDefinitionError(`enum provided for non-string datatype ${datatype}`);
            }
            this.enum = new Set(definition.enum);
        } else {
            this.enum = undefined;
        }

        if (isNumericDatatype(datatype)) {
            const [low, high] = datatypeBounds(datatype);
            this.min = definition.min === undefined ? low : Math.max(definition.min, low);
            this.max = definition.max === undefined ? high : Math.min(definition.max, high);
            if (this.min > this.max) {
                throw new SignalDefinitionError(`min ${this.min} exceeds max ${this.max}`);
            }
        } else {
            this.min = undefined;
            this.max = undefined;
        }

        this.default = definition.default;
        if (this.default !== undefined) {
            this.checkDefault(this.default);
        }

        const unit = definition.unit ?? DIMENSIONLESS;
        try {
            this.vssUnit = registry.parse(unit);
        } catch (error) {
            throw new SignalDefinitionError(`illegal unit '${unit}'`, { cause: error });
        }
        this.unit = unit;

        if (!isNumericDatatype(datatype) && !this.vssUnit.dimensionless) {
            throw new SignalDefinitionError(`datatype ${datatype} is not compatible with unit ${unit}`);
        }

        if (this.namespace.length === 0) {
            throw new SignalDefinitionError('namespace must contain at least one key');
        }
        if (this.namespace.some(key => key.length === 0)) {
            throw new SignalDefinitionError('namespace cannot contain an empty key');
        }

        Object.freeze(this);
    }

    /**
     * Build a signal from a raw leaf node. `instances`, if present, belongs
     * to the path rather than the signal and is ignored.
     *
     * @throws SignalDefinitionError if the node does not match the leaf schema
     *   or the definition is inconsistent
     */
    static fromNode(namespace: readonly string[], node: unknown, registry: UnitRegistry = defaultRegistry): Signal {
        const parsed = leafSchema.safeParse(node);
        if (!parsed.success) {
            const issues = parsed.error.issues
                .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
                .join('; ');
            throw new SignalDefinitionError(`invalid leaf node: ${issues}`, { cause: parsed.error });
        }

        const { instances: _instances, ...leaf } = parsed.data;
        return new Signal({ ...leaf, namespace }, registry);
    }

    get path(): string {
        return this.namespace.join('.');
    }

    /**
     * Limit a number to the signal's bounds, truncating for integer datatypes.
     *
     * @throws SignalValueError for string and boolean signals
     */
    clamp(value: number): number {
        if (this.min === undefined || this.max === undefined) {
            throw new SignalValueError(`cannot clamp numeric value to non-numeric datatype ${this.datatype}`);
        }

        const clamped = Math.max(Math.min(value, this.max), this.min);
        return isIntegerDatatype(this.datatype) ? Math.trunc(clamped) : clamped;
    }

    /**
     * Check that a runtime value can be carried by this signal.
     *
     * @returns the value, narrowed
     * @throws SignalValueError describing the first mismatch
     */
    validate(value: unknown): SignalValue {
        switch (this.datatype) {
            case 'boolean':
                if (typeof value !== 'boolean') {
                    throw new SignalValueError(`${this.path} expects a boolean, got ${describe(value)}`);
                }
                return value;
            case 'string':
                if (typeof value !== 'string') {
                    throw new SignalValueError(`${this.path} expects a string, got ${describe(value)}`);
                }
                if (this.enum !== undefined && !this.enum.has(value)) {
                    throw new SignalValueError(
                        `${this.path} expects one of [${[...this.enum].join(', ')}], got '${value}'`
                    );
                }
                return value;
            default:
                if (typeof value !== 'number' || !Number.isFinite(value)) {
                    throw new SignalValueError(`${this.path} expects a finite number, got ${describe(value)}`);
                }
                if (isIntegerDatatype(this.datatype) && !Number.isInteger(value)) {
                    throw new SignalValueError(`${this.path} expects an integer (${this.datatype}), got ${value}`);
                }
                if (this.clamp(value) !== value) {
                    throw new SignalValueError(`${this.path} value ${value} is outside [${this.min}, ${this.max}]`);
                }
                return value;
        }
    }

    /**
     * Convert a value of this signal into another unit.
     *
     * @throws SignalValueError if the value does not fit the signal
     * @throws UnitError if the units are not convertible
     */
    convert(value: number, toUnit: string): number {
        const checked = this.validate(value);
        if (typeof checked !== 'number') {
            throw new UnitError(`cannot convert non-numeric signal ${this.path}`);
        }
        return this.registry.convert(checked, this.unit, toUnit);
    }

    toString(): string {
        return this.path;
    }

    toJSON(): SignalJson {
        const json: SignalJson = {
            path: this.path,
            namespace: [...this.namespace],
            type: this.type,
            datatype: this.datatype,
            unit: this.unit,
            description: this.description,
            uuid: this.uuid,
        };
        if (this.min !== undefined) json.min = this.min;
        if (this.max !== undefined) json.max = this.max;
        if (this.default !== undefined) json.default = this.default;
        if (this.enum !== undefined) json.enum = [...this.enum].sort();
        if (this.comment !== undefined) json.comment = this.comment;
        if (this.deprecation !== undefined) json.deprecation = this.deprecation;
        return json;
    }

    private checkDefault(value: SignalValue): void {
        const datatype = this.datatype;
        const matches =
            datatype === 'boolean' ? typeof value === 'boolean'
                : datatype === 'string' ? typeof value === 'string'
                    : typeof value === 'number' && (!isIntegerDatatype(datatype) || Number.isInteger(value));
        if (!matches) {
            throw new SignalDefinitionError(
                `default value type ${typeof value} does not match expected datatype ${datatype}`
            );
        }

        if (typeof value === 'number' && this.clamp(value) !== value) {
            throw new SignalDefinitionError(`default value ${value} is illegal for datatype ${datatype}`);
        }
        if (typeof value === 'string' && this.enum !== undefined && !this.enum.has(value)) {
            throw new SignalDefinitionError(`default value '${value}' is not one of the allowed values`);
        }
    }
}

function describe(value: unknown): string {
    if (value === null) return 'null';
    if (typeof value === 'string') return `'${value}'`;
    if (typeof value === 'object') return Array.isArray(value) ? 'array' : 'object';
    return `${typeof value} ${String(value)}`;
}
