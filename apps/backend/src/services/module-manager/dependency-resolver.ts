import type { IModuleDescriptor } from '@everly/types';
import { DependencyCycleError, MissingDependencyError } from './errors.js';

/**
 * Compute the order in which modules must be initialized.
 *
 * Every module comes after all of its declared dependencies. Whenever several
 * modules are ready at the same time, the one registered first goes first,
 * so the same registrations always produce the same order.
 *
 * Missing dependencies are reported before cycles: the first unknown name
 * found when walking modules in registration order, and each module's
 * dependencies in declaration order, is the one reported. Duplicate entries
 * in a dependency list count once.
 *
 * @param descriptors - Module descriptors in registration order
 * @returns Module names in initialization order
 * @throws {MissingDependencyError} When a dependency names an unregistered module
 * @throws {DependencyCycleError} When no order exists; lists every unordered module
 *
 * @example
 * ```typescript
 * resolveInitializationOrder([
 *     { name: 'diaries', version: '1.0.0', description: '', dependencies: ['auth', 'users'] },
 *     { name: 'users', version: '1.0.0', description: '', dependencies: [] },
 *     { name: 'auth', version: '1.0.0', description: '', dependencies: ['users'] }
 * ]);
 * // ['users', 'auth', 'diaries']
 * ```
 */
export function resolveInitializationOrder(descriptors: readonly IModuleDescriptor[]): readonly string[] {
    const registered = new Set(descriptors.map(descriptor => descriptor.name));

    for (const descriptor of descriptors) {
        for (const dependency of descriptor.dependencies) {
            if (!registered.has(dependency)) {
                throw new MissingDependencyError(descriptor.name, dependency);
            }
        }
    }

    const pending = descriptors.map(descriptor => ({
        name: descriptor.name,
        dependencies: new Set(descriptor.dependencies)
    }));
    const emitted = new Set<string>();
    const order: string[] = [];

    while (pending.length > 0) {
        // Earliest-registered module whose dependencies are all placed
        const nextIndex = pending.findIndex(node =>
            [...node.dependencies].every(dependency => emitted.has(dependency))
        );

        if (nextIndex === -1) {
            throw new DependencyCycleError(pending.map(node => node.name));
        }

        const [next] = pending.splice(nextIndex, 1);
        emitted.add(next.name);
        order.push(next.name);
    }

    return order;
}
