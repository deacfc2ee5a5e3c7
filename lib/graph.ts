import {
    ConflictingBaseError,
    CyclicDependencyError,
    DanglingReferenceError,
    MissingBaseError,
    UnknownUnitError,
} from './errors.js';
import type { UnitRegistry } from './registry.js';

type Color = 'white' | 'grey' | 'black';

/**
 * Directed acyclic graph over unit names; an edge A -> B means "A requires B".
 * Adjacency is index based: `edges[i]` lists the indices of the units that
 * unit `i` requires, in declaration order.
 */
export class DependencyGraph {
    private readonly index: Map<string, number>;
    private readonly reverse: number[][];

    constructor(
        public readonly names: readonly string[],
        private readonly edges: readonly (readonly number[])[],
    ) {
        this.index = new Map(names.map((name, i) => [name, i]));
        this.reverse = names.map(() => []);
        edges.forEach((targets, from) => {
            for (const to of targets) {
                this.reverse[to]?.push(from);
            }
        });
    }

    public get size(): number {
        return this.names.length;
    }

    public has(name: string): boolean {
        return this.index.has(name);
    }

    /**
     * Declaration position of a unit
     * @throws UnknownUnitError
     */
    public indexOf(name: string): number {
        const i = this.index.get(name);
        if (i === undefined) {
            throw new UnknownUnitError(name);
        }
        return i;
    }

    /** Direct requirements, in declaration order */
    public dependenciesOf(name: string): string[] {
        return this.adjacent(this.edges, name);
    }

    /** Units that directly require `name`, in declaration order */
    public dependentsOf(name: string): string[] {
        return this.adjacent(this.reverse, name);
    }

    /** Every unit reachable through `requires` edges, excluding `name` */
    public transitiveDependencies(name: string): Set<string> {
        return this.reach(this.edges, name);
    }

    /** Every unit that requires `name` directly or indirectly */
    public transitiveDependents(name: string): Set<string> {
        return this.reach(this.reverse, name);
    }

    private adjacent(
        adjacency: readonly (readonly number[])[],
        name: string,
    ): string[] {
        const targets = adjacency[this.indexOf(name)] ?? [];
        return targets.map((i) => this.nameAt(i));
    }

    private reach(
        adjacency: readonly (readonly number[])[],
        name: string,
    ): Set<string> {
        const seen = new Set<number>();
        const stack = [this.indexOf(name)];
        while (stack.length > 0) {
            const current = stack.pop();
            if (current === undefined) break;
            for (const next of adjacency[current] ?? []) {
                if (!seen.has(next)) {
                    seen.add(next);
                    stack.push(next);
                }
            }
        }
        return new Set([...seen].sort((a, b) => a - b).map((i) => this.nameAt(i)));
    }

    private nameAt(i: number): string {
        const name = this.names[i];
        if (name === undefined) {
            throw new RangeError(`No unit at index ${i}`);
        }
        return name;
    }
}

/**
 * Build and validate the dependency graph of a registry.
 *
 * Fails on the first structural problem found, checked in this order:
 * a `requires` entry naming an undefined unit, a dependency cycle, then a
 * unit whose ancestry declares more than one distinct base image or none.
 */
export function buildGraph(registry: UnitRegistry): DependencyGraph {
    const names = registry.names();
    const index = new Map(names.map((name, i) => [name, i]));

    const edges = registry.units().map((unit) =>
        unit.requires.map((required) => {
            const target = index.get(required);
            if (target === undefined) {
                throw new DanglingReferenceError(unit.name, required);
            }
            return target;
        }),
    );

    detectCycle(names, edges);

    const graph = new DependencyGraph(names, edges);
    checkBases(registry, graph);
    return graph;
}

function detectCycle(names: readonly string[], edges: readonly number[][]): void {
    const color: Color[] = names.map((): Color => 'white');
    const stack: number[] = [];

    const visit = (node: number): void => {
        color[node] = 'grey';
        stack.push(node);
        for (const next of edges[node] ?? []) {
            if (color[next] === 'grey') {
                const cycle = stack.slice(stack.indexOf(next));
                cycle.push(next);
                throw new CyclicDependencyError(
                    cycle.map((i) => names[i] ?? String(i)),
                );
            }
            if (color[next] === 'white') {
                visit(next);
            }
        }
        stack.pop();
        color[node] = 'black';
    };

    names.forEach((_, node) => {
        if (color[node] === 'white') {
            visit(node);
        }
    });
}

function checkBases(registry: UnitRegistry, graph: DependencyGraph): void {
    const memo = new Map<string, string[]>();

    const basesOf = (name: string): string[] => {
        const cached = memo.get(name);
        if (cached) {
            return cached;
        }
        const bases: string[] = [];
        for (const dependency of graph.dependenciesOf(name)) {
            for (const base of basesOf(dependency)) {
                if (!bases.includes(base)) bases.push(base);
            }
        }
        const own = registry.lookup(name).baseReference;
        if (own !== undefined && !bases.includes(own)) {
            bases.push(own);
        }
        memo.set(name, bases);
        return bases;
    };

    for (const name of graph.names) {
        const bases = basesOf(name);
        if (bases.length > 1) {
            throw new ConflictingBaseError(name, bases);
        }
        if (bases.length === 0) {
            throw new MissingBaseError(name);
        }
    }
}
