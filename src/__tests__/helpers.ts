/**
 * Shared test utilities
 */

import { BindingRegistry } from '../registry';
import { BindingMap } from '../types';

/**
 * Create a registry pre-populated from a binding map
 */
export function createTestRegistry<TContext = unknown>(bindings: BindingMap<TContext> = {}): BindingRegistry<TContext> {
    const registry = new BindingRegistry<TContext>();
    registry.registerAll(bindings);
    return registry;
}

/**
 * Run a function expected to throw and return what it threw
 */
export function captureError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (error) {
        return error;
    }
    throw new Error('Expected function to throw');
}
