import { DuplicateNameError, UnknownUnitError } from './errors.js';
import type { ImageUnit } from './types/index.js';

/**
 * Unit Registry
 *
 * Owns the ImageUnit definitions of a manifest, keyed by name. Enumeration
 * follows insertion order, which is the manifest's declaration order.
 *
 * @example
 * ```typescript
 * const registry = UnitRegistry.from([
 *   { name: 'base', baseReference: 'debian:bookworm', requires: [], buildSteps: '' },
 *   { name: 'python', requires: ['base'], buildSteps: 'RUN apt-get install -y python3' },
 * ]);
 * registry.lookup('python').requires; // ['base']
 * ```
 */
export class UnitRegistry {
    private readonly units_ = new Map<string, ImageUnit>();

    static from(units: Iterable<ImageUnit>): UnitRegistry {
        const registry = new UnitRegistry();
        for (const unit of units) {
            registry.register(unit);
        }
        return registry;
    }

    /**
     * Add a unit definition
     * @throws DuplicateNameError if a unit with the same name exists
     */
    public register(unit: ImageUnit): void {
        if (this.units_.has(unit.name)) {
            throw new DuplicateNameError(unit.name);
        }
        this.units_.set(unit.name, {
            ...unit,
            requires: [...unit.requires],
        });
    }

    /**
     * @throws UnknownUnitError if no unit has this name
     */
    public lookup(name: string): ImageUnit {
        const unit = this.units_.get(name);
        if (!unit) {
            throw new UnknownUnitError(name);
        }
        return unit;
    }

    public has(name: string): boolean {
        return this.units_.has(name);
    }

    public names(): string[] {
        return [...this.units_.keys()];
    }

    public units(): ImageUnit[] {
        return [...this.units_.values()];
    }

    public get size(): number {
        return this.units_.size;
    }
}
