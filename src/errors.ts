/** Base class of everything the engine itself throws. */
export class StateMachineError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "StateMachineError";
	}
}

/**
 * Thrown synchronously by the offending builder call: duplicate rule,
 * mutation after `complete()`, or an instance with no way to pick its
 * initial state.
 */
export class ConfigurationError extends StateMachineError {
	constructor(message: string) {
		super(message);
		this.name = "ConfigurationError";
	}
}

/** No rule of any kind matched the event in the current state. */
export class EventNotAllowedError<TState = unknown, TEvent = unknown>
	extends StateMachineError
{
	readonly state: TState;
	readonly event: TEvent;

	constructor(state: TState, event: TEvent) {
		super(
			`Event "${String(event)}" not allowed in state "${String(state)}"`
		);
		this.name = "EventNotAllowedError";
		this.state = state;
		this.event = event;
	}
}

/** `sendEvent` was called from inside a dispatch on the same instance. */
export class ReentrantEventError<TEvent = unknown> extends StateMachineError {
	readonly event: TEvent;

	constructor(event: TEvent) {
		super(
			`Cannot send event "${String(event)}" while another event is being handled`
		);
		this.name = "ReentrantEventError";
		this.event = event;
	}
}
