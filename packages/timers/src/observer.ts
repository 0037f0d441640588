/**
 * Synchronous observer list used for timer invocation events.
 *
 * @example
 * const subject = createSubject<{ name: string }>();
 * const unsubscribe = subject.subscribe(({ name }) => console.log(name));
 * subject.notify({ name: 'heartbeat' });
 * unsubscribe();
 */

export type Observer<T> = (event: T) => void;

export type Unsubscribe = () => void;

export type Subject<T> = {
  /** Subscribe an observer to receive notifications. Returns an unsubscribe function. */
  subscribe(observer: Observer<T>): Unsubscribe;

  /** Notify all observers in subscription order. Errors are caught and reported via onError. */
  notify(event: T): void;

  /** Returns the current number of subscribed observers. */
  size(): number;

  clear(): void;
};

export type SubjectOptions<T> = {
  onError?: (error: unknown, event: T) => void;
};

export function createSubject<T>(options: SubjectOptions<T> = {}): Subject<T> {
  const observers = new Set<Observer<T>>();
  const onError = options.onError ?? ((err) => console.error('Observer error:', err));

  return {
    subscribe(observer) {
      observers.add(observer);
      return () => {
        observers.delete(observer);
      };
    },

    notify(event) {
      // snapshot: observers added while notifying only see later events
      for (const observer of Array.from(observers)) {
        try {
          observer(event);
        } catch (err: unknown) {
          onError(err, event);
        }
      }
    },

    size() {
      return observers.size;
    },

    clear() {
      observers.clear();
    },
  };
}
