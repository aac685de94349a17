import type { Declaration } from "../entities/declaration.js";
import {
    CyclicDependencyError,
    MalformedDeclarationError,
    UnresolvedDependencyError,
} from "../entities/errors.js";

export interface DependencyGraph {
    /** Declarations with every dependency ahead of its dependents. */
    readonly order: readonly Declaration[];
    get(id: string): Declaration | undefined;
    indexOf(id: string): number;
    dependenciesOf(id: string): readonly string[];
    dependentsOf(id: string): readonly string[];
}

export interface DependencyGraphBuilder {
    build(declarations: readonly Declaration[]): DependencyGraph;
}

type VisitState = "in-progress" | "done";

function indexDeclarations(
    declarations: readonly Declaration[],
): Map<string, Declaration> {
    const byId = new Map<string, Declaration>();
    for (const declaration of declarations) {
        if (byId.has(declaration.id)) {
            throw new MalformedDeclarationError(
                declaration.id,
                "identifier is declared more than once",
            );
        }
        byId.set(declaration.id, declaration);
    }
    return byId;
}

function resolveEdges(
    declarations: readonly Declaration[],
    byId: ReadonlyMap<string, Declaration>,
): Map<string, readonly string[]> {
    const edges = new Map<string, readonly string[]>();
    for (const declaration of declarations) {
        const dependencies = [...new Set(declaration.requires)];
        for (const dependency of dependencies) {
            if (!byId.has(dependency)) {
                throw new UnresolvedDependencyError(declaration.id, dependency);
            }
        }
        edges.set(declaration.id, dependencies);
    }
    return edges;
}

// Unvisited nodes are simply absent from the state map
function assertAcyclic(
    declarations: readonly Declaration[],
    edges: ReadonlyMap<string, readonly string[]>,
): void {
    const state = new Map<string, VisitState>();
    const path: string[] = [];

    const visit = (id: string): void => {
        state.set(id, "in-progress");
        path.push(id);
        for (const dependency of edges.get(id) ?? []) {
            const dependencyState = state.get(dependency);
            if (dependencyState === "in-progress") {
                const start = path.indexOf(dependency);
                throw new CyclicDependencyError([
                    ...path.slice(start),
                    dependency,
                ]);
            }
            if (dependencyState === undefined) {
                visit(dependency);
            }
        }
        path.pop();
        state.set(id, "done");
    };

    for (const declaration of declarations) {
        if (!state.has(declaration.id)) {
            visit(declaration.id);
        }
    }
}

function insertByIndex(
    queue: string[],
    id: string,
    position: ReadonlyMap<string, number>,
): void {
    const rank = position.get(id) ?? 0;
    let at = queue.length;
    while (at > 0 && (position.get(queue[at - 1] ?? "") ?? 0) > rank) {
        at--;
    }
    queue.splice(at, 0, id);
}

function sortTopologically(
    declarations: readonly Declaration[],
    edges: ReadonlyMap<string, readonly string[]>,
    dependents: ReadonlyMap<string, readonly string[]>,
): string[] {
    const position = new Map(
        declarations.map(
            (declaration, index) => [declaration.id, index] as const,
        ),
    );
    const pending = new Map<string, number>();
    const ready: string[] = [];

    for (const declaration of declarations) {
        const count = edges.get(declaration.id)?.length ?? 0;
        pending.set(declaration.id, count);
        if (count === 0) {
            ready.push(declaration.id);
        }
    }

    const order: string[] = [];
    let next = ready.shift();
    while (next !== undefined) {
        order.push(next);
        for (const dependent of dependents.get(next) ?? []) {
            const left = (pending.get(dependent) ?? 0) - 1;
            pending.set(dependent, left);
            if (left === 0) {
                insertByIndex(ready, dependent, position);
            }
        }
        next = ready.shift();
    }

    return order;
}

export function createDependencyGraphBuilder(): DependencyGraphBuilder {
    return {
        build(declarations: readonly Declaration[]): DependencyGraph {
            const byId = indexDeclarations(declarations);
            const edges = resolveEdges(declarations, byId);
            assertAcyclic(declarations, edges);

            const dependents = new Map<string, string[]>();
            for (const declaration of declarations) {
                dependents.set(declaration.id, []);
            }
            for (const [id, dependencies] of edges) {
                for (const dependency of dependencies) {
                    dependents.get(dependency)?.push(id);
                }
            }

            const orderedIds = sortTopologically(
                declarations,
                edges,
                dependents,
            );
            const order: Declaration[] = [];
            for (const id of orderedIds) {
                const declaration = byId.get(id);
                if (declaration) {
                    order.push(declaration);
                }
            }
            const orderIndex = new Map(
                order.map(
                    (declaration, index) => [declaration.id, index] as const,
                ),
            );

            return {
                order,
                get: (id) => byId.get(id),
                indexOf: (id) => orderIndex.get(id) ?? -1,
                dependenciesOf: (id) => edges.get(id) ?? [],
                dependentsOf: (id) => dependents.get(id) ?? [],
            };
        },
    };
}
