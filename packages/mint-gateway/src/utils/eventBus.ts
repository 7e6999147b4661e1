import { logger } from './logger';

export type Listener<T> = (payload: T) => void;

/**
 * Synchronous, typed publish/subscribe channel.
 * `on` returns the matching unsubscribe function.
 */
export class TypedEventBus<Events extends Record<string, unknown>> {
    private listeners: { [K in keyof Events]?: Set<Listener<Events[K]>> } = {};

    on<K extends keyof Events>(name: K, listener: Listener<Events[K]>): () => void {
        const registered = this.listeners[name] ?? new Set<Listener<Events[K]>>();
        this.listeners[name] = registered;
        registered.add(listener);

        return () => {
            registered.delete(listener);
        };
    }

    emit<K extends keyof Events>(name: K, payload: Events[K]): void {
        const registered = this.listeners[name];
        if (!registered) return;

        // A failing subscriber must not undo state that already changed
        for (const listener of [...registered]) {
            try {
                listener(payload);
            } catch (error) {
                logger.error('Event listener failed', { event: String(name), error: String(error) });
            }
        }
    }

    listenerCount(name: keyof Events): number {
        return this.listeners[name]?.size ?? 0;
    }
}
