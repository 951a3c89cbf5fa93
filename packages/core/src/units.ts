/**
 * Unit registry for VSS signal units.
 *
 * Physical units are parsed and converted by a private mathjs instance.
 * VSS also uses a handful of symbols mathjs does not know ("%", "ratio",
 * "l/100km", "UNIX Timestamp", ...); those are registered on top, either as
 * dimensionless scalars or as derived mathjs units.
 */

import { all, create, type Unit } from 'mathjs';
import { UnitError } from './errors.js';

type MathInstance = ReturnType<typeof create>;

/** How a VSS unit symbol is defined in the registry. */
export type UnitDefinition =
    /** A pure number, scaled by `factor` relative to 1 */
    | { kind: 'dimensionless'; factor: number }
    /** A mathjs expression, e.g. "0.01 l/km" */
    | { kind: 'derived'; definition: string };

/** A parsed unit. */
export type VssUnit =
    | {
        readonly kind: 'scalar';
        readonly symbol: string;
        readonly dimensionless: true;
        readonly factor: number;
    }
    | {
        readonly kind: 'physical';
        readonly symbol: string;
        readonly dimensionless: boolean;
        /** Expression handed to mathjs for this symbol */
        readonly expression: string;
        readonly unit: Unit;
    };

export const DIMENSIONLESS = 'dimensionless';

// mathjs unit names: a letter, then letters and digits.
const IDENTIFIER = /^[A-Za-z][A-Za-z0-9]*$/;

// Position of ANGLE in mathjs's base dimensions. Angles count as dimensionless.
const ANGLE_DIMENSION = 7;

export class UnitRegistry {
    private readonly math: MathInstance = create(all);
    private readonly scalars = new Map<string, number>([[DIMENSIONLESS, 1]]);
    private readonly aliases = new Map<string, string>();
    private readonly internalNames = new Map<string, string>();

    /**
     * Register a unit symbol. Redefining a symbol replaces it, including
     * symbols mathjs ships with.
     */
    define(symbol: string, definition: UnitDefinition): void {
        if (definition.kind === 'dimensionless') {
            this.scalars.set(symbol, definition.factor);
            return;
        }

        const name = IDENTIFIER.test(symbol) ? symbol : this.internalName(symbol);
        try {
            this.math.createUnit(name, definition.definition, { override: true });
        } catch (error) {
            throw new UnitError(`cannot define unit '${symbol}' as '${definition.definition}'`, { cause: error });
        }
        if (name !== symbol) {
            this.aliases.set(symbol, name);
        }
    }

    /** Make `symbol` another name for the existing unit `target`. */
    alias(symbol: string, target: string): void {
        const factor = this.scalars.get(target);
        if (factor !== undefined) {
            this.scalars.set(symbol, factor);
        } else if (IDENTIFIER.test(symbol)) {
            this.define(symbol, { kind: 'derived', definition: `1 ${target}` });
        } else {
            this.aliases.set(symbol, target);
        }
    }

    /**
     * Parse a unit symbol. An empty symbol is dimensionless.
     *
     * @throws UnitError if the symbol is not a known unit expression
     */
    parse(symbol: string): VssUnit {
        const trimmed = symbol.trim() || DIMENSIONLESS;

        const factor = this.scalars.get(trimmed);
        if (factor !== undefined) {
            return { kind: 'scalar', symbol: trimmed, dimensionless: true, factor };
        }

        const expression = this.aliases.get(trimmed) ?? trimmed;
        let unit: Unit;
        try {
            unit = this.math.unit(expression);
        } catch (error) {
            throw new UnitError(`illegal unit '${symbol}'`, { cause: error });
        }
        // "5 km" parses as a quantity, not a unit.
        const value: unknown = unit.value;
        if (value !== null && value !== undefined) {
            throw new UnitError(`illegal unit '${symbol}'`);
        }

        return {
            kind: 'physical',
            symbol: trimmed,
            dimensionless: unit.dimensions.every((power, index) => index === ANGLE_DIMENSION || power === 0),
            expression,
            unit,
        };
    }

    /** Whether `symbol` parses. */
    isKnown(symbol: string): boolean {
        try {
            this.parse(symbol);
            return true;
        } catch {
            return false;
        }
    }

    /**
     * Convert a value between two units.
     *
     * @throws UnitError if either unit is unknown or they measure different things
     */
    convert(value: number, from: string, to: string): number {
        const source = this.parse(from);
        const target = this.parse(to);

        if (source.kind === 'scalar' && target.kind === 'scalar') {
            return (value * source.factor) / target.factor;
        }
        if (source.kind === 'physical' && target.kind === 'physical' && source.unit.equalBase(target.unit)) {
            try {
                return this.math.unit(value, source.expression).toNumber(target.expression);
            } catch (error) {
                throw new UnitError(`cannot convert from '${from}' to '${to}'`, { cause: error });
            }
        }
        throw new UnitError(`cannot convert from '${from}' to '${to}'`);
    }

    /** A mathjs-safe name for a symbol such as "l/100km", unique in this registry. */
    private internalName(symbol: string): string {
        const existing = this.internalNames.get(symbol);
        if (existing !== undefined) {
            return existing;
        }
        const base = `vss${symbol.replace(/[^A-Za-z0-9]/g, '')}`;
        const taken = new Set(this.internalNames.values());
        let name = base;
        for (let n = 2; taken.has(name); n++) {
            name = `${base}${n}`;
        }
        this.internalNames.set(symbol, name);
        return name;
    }
}

/**
 * Build a registry carrying the symbols VSS trees use that mathjs lacks
 * or reads differently.
 */
export function createRegistry(): UnitRegistry {
    const reg = new UnitRegistry();

    reg.define('%', { kind: 'dimensionless', factor: 0.01 });
    reg.alias('percent', '%');
    reg.define('ratio', { kind: 'dimensionless', factor: 1 });
    reg.define('stars', { kind: 'dimensionless', factor: 1 });

    // VSS uses h as hour.
    reg.alias('h', 'hour');
    reg.alias('degrees', 'deg');
    reg.alias('UNIX Timestamp', 's');

    reg.define('rpm', { kind: 'derived', definition: '0.016666666666666666 Hz' });
    reg.define('Nm', { kind: 'derived', definition: '1 N m' });
    reg.define('PS', { kind: 'derived', definition: '735.49875 W' });
    reg.define('mph', { kind: 'derived', definition: '1 mi/hour' });
    reg.define('l/100km', { kind: 'derived', definition: '0.01 l/km' });
    reg.define('kWh/100km', { kind: 'derived', definition: '0.01 kWh/km' });

    return reg;
}

/** Process-wide default registry. */
export const registry: UnitRegistry = createRegistry();
