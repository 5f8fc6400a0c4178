/**
 * ChangeNotifier
 *
 * Topic-keyed wake-ups for waiters. State owners call notify() after each
 * mutation; pollUntil() re-evaluates its predicate on every notification of
 * the topics it watches and falls back to interval polling for everything else.
 */

import { EventEmitter } from 'events';

export type ChangeTopic = 'network' | 'dom' | 'request' | 'response' | 'connection' | 'frame';

export class ChangeNotifier {
    private emitter = new EventEmitter();

    constructor() {
        // Every concurrent wait registers one listener per topic
        this.emitter.setMaxListeners(0);
    }

    notify(topic: ChangeTopic): void {
        this.emitter.emit(topic);
    }

    /**
     * Call `listener` whenever any of `topics` changes.
     * @returns function that removes the listener from every topic
     */
    watch(topics: readonly ChangeTopic[], listener: () => void): () => void {
        for (const topic of topics) {
            this.emitter.on(topic, listener);
        }
        return () => {
            for (const topic of topics) {
                this.emitter.off(topic, listener);
            }
        };
    }

    listenerCount(topic: ChangeTopic): number {
        return this.emitter.listenerCount(topic);
    }
}
