import EventEmitter from "eventemitter3";

/** Event name to handler signature, e.g. `{ trade: (t: TradeEvent) => void }`. */
export type EventMap = Record<string, (...args: never[]) => void>;

type Handler = (...args: unknown[]) => void;

type EventName<TEvents> = keyof TEvents & string;

/**
 * eventemitter3 with handler signatures checked against an event map.
 * Handlers run synchronously inside `emit`.
 */
export class TypedEmitter<TEvents extends EventMap> {
	private readonly ee = new EventEmitter();

	on<K extends EventName<TEvents>>(event: K, handler: TEvents[K]): this {
		this.ee.on(event, handler as Handler);
		return this;
	}

	once<K extends EventName<TEvents>>(event: K, handler: TEvents[K]): this {
		this.ee.once(event, handler as Handler);
		return this;
	}

	off<K extends EventName<TEvents>>(event: K, handler: TEvents[K]): this {
		this.ee.off(event, handler as Handler);
		return this;
	}

	/** False when nobody listened. */
	emit<K extends EventName<TEvents>>(event: K, ...args: Parameters<TEvents[K]>): boolean {
		return this.ee.emit(event, ...args);
	}
}
