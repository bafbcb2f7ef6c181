import EventEmitter from "eventemitter3";

/**
 * Event map -- keys are event names, values are handler signatures.
 * Declare maps with `type`, not `interface`, so they satisfy the index signature.
 */
export type EventMap = Record<string, (...args: never[]) => void>;

type Listener = (...args: unknown[]) => void;

/**
 * Type-safe event emitter wrapping eventemitter3.
 *
 * @example
 * ```ts
 * type Events = { correlation: (g: CorrelationGroup) => void };
 * const emitter = new TypedEmitter<Events>();
 * emitter.on("correlation", (g) => console.log(g.scopeKey));
 * ```
 */
export class TypedEmitter<TEvents extends EventMap> {
	private readonly ee = new EventEmitter();

	on<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.on(event, handler as Listener);
		return this;
	}

	off<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.off(event, handler as Listener);
		return this;
	}

	once<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.once(event, handler as Listener);
		return this;
	}

	/** Invokes handlers synchronously in registration order. */
	emit<K extends keyof TEvents & string>(event: K, ...args: Parameters<TEvents[K]>): boolean {
		return this.ee.emit(event, ...args);
	}

	removeAllListeners<K extends keyof TEvents & string>(event?: K): this {
		if (event) {
			this.ee.removeAllListeners(event);
		} else {
			this.ee.removeAllListeners();
		}
		return this;
	}

	listenerCount<K extends keyof TEvents & string>(event: K): number {
		return this.ee.listenerCount(event);
	}
}
