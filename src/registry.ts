/**
 * Binding Registry
 *
 * Maps placeholder names to static values or handlers. Names are matched
 * case-sensitively; registering a name again replaces the earlier binding.
 * The registry does no locking: callers sharing one across renders must not
 * register while a render is in progress.
 */

import debug from 'debug';
import { Binding, BindingMap, Handler } from './types';

const log = debug('bracer:registry');

/**
 * Serializable view of one registry entry
 */
export interface BindingSnapshot {
    name: string;
    kind: Binding['kind'];
}

export class BindingRegistry<TContext = unknown> {
    protected bindings = new Map<string, Binding<TContext>>();

    /**
     * Register a binding under a name
     */
    register(name: string, binding: Binding<TContext>): void {
        if (this.bindings.has(name)) {
            log('Overwriting existing binding', { name, kind: binding.kind });
        }
        this.bindings.set(name, binding);
        log('Registered binding', { name, kind: binding.kind });
    }

    /**
     * Register a fixed substitution value
     */
    registerStatic(name: string, value: string): void {
        this.register(name, { kind: 'static', value });
    }

    /**
     * Register a handler invoked with the placeholder's arguments and the render context
     */
    registerHandler(name: string, handler: Handler<TContext>): void {
        this.register(name, { kind: 'handler', handler });
    }

    /**
     * Register several bindings: strings as static values, functions as handlers
     */
    registerAll(bindings: BindingMap<TContext>): void {
        for (const [name, value] of Object.entries(bindings)) {
            if (typeof value === 'string') {
                this.registerStatic(name, value);
            } else {
                this.registerHandler(name, value);
            }
        }
    }

    /**
     * Look up the binding for a name
     */
    resolve(name: string): Binding<TContext> | undefined {
        return this.bindings.get(name);
    }

    has(name: string): boolean {
        return this.bindings.has(name);
    }

    /**
     * Remove a binding by name
     */
    remove(name: string): boolean {
        return this.bindings.delete(name);
    }

    clear(): void {
        this.bindings.clear();
    }

    /**
     * Registered names, in order of first registration
     */
    names(): string[] {
        return Array.from(this.bindings.keys());
    }

    toJSON(): BindingSnapshot[] {
        return Array.from(this.bindings, ([name, binding]) => ({ name, kind: binding.kind }));
    }
}
