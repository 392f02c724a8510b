import { createPubSub } from "@marianmeres/pubsub";
import type { StateMachineDefinition } from "./definition.ts";
import { EventNotAllowedError, ReentrantEventError } from "./errors.ts";
import type {
	FSMArgs,
	FSMKey,
	PublishedState,
	ResolvedRule,
	StateAction,
	Unsubscribe,
} from "./types.ts";

/**
 * A definition bound to one context, tracking the current state.
 *
 * Instances are created with `StateMachineDefinition.create()`. `sendEvent` is
 * the only way the state changes.
 *
 * **Transition types:**
 * - **External transitions** (with target): exit hooks → action → state change → entry hooks
 * - **Internal transitions** (no target): only the action runs
 * - **Default actions** (state or global): always internal, the action also
 *   receives the current state and the event
 *
 * Exit and entry hooks run state specific first, then global.
 *
 * Not re-entrant: calling `sendEvent` from inside one of this instance's own
 * guards, actions or hooks throws `ReentrantEventError`. Subscribers run after
 * the dispatch completed and may send events freely.
 *
 * @template TState - Union type (or enum) of all possible states
 * @template TEvent - Union type (or enum) of all possible events
 * @template TContext - Type of the context the actions operate on
 *
 * @example
 * ```typescript
 * const fsm = definition.create(turnstile);
 * fsm.sendEvent("coin");
 * fsm.currentState; // "UNLOCKED"
 * ```
 */
export class StateMachineInstance<
	TState extends FSMKey,
	TEvent extends FSMKey,
	TContext = unknown
> {
	/** FSM's previous state */
	#previous: TState | null = null;

	/** FSM's current state */
	#state: TState;

	/** Set while an event is being handled */
	#dispatching = false;

	/** Internal pub sub */
	#pubsub = createPubSub();

	constructor(
		public readonly definition: StateMachineDefinition<TState, TEvent, TContext>,
		public readonly context: TContext,
		initialState: TState
	) {
		this.#state = initialState;
		this.#debugLog(`FSM created with initial state "${String(this.#state)}"`);
	}

	/** Log debug message if debug mode is enabled */
	#debugLog(...args: unknown[]): void {
		if (this.definition.debug) {
			this.definition.logger.debug("[FSM]", ...args);
		}
	}

	/**
	 * Returns the current state of the FSM.
	 * This is a non-reactive getter; use `subscribe()` for reactive updates.
	 */
	get currentState(): TState {
		return this.#state;
	}

	/** Checks whether the FSM is currently in the given state. */
	is(state: TState): boolean {
		return this.#state === state;
	}

	/**
	 * Events that have a rule from the current state.
	 * See `StateMachineDefinition.allowed`.
	 */
	allowed(includeDefaults = false): Set<TEvent> {
		return this.definition.allowed(this.#state, includeDefaults);
	}

	/**
	 * Whether `event` has a rule from the current state. Guards are not
	 * evaluated, so `sendEvent` may still reject a guarded event.
	 */
	eventAllowed(event: TEvent, includeDefault = false): boolean {
		return this.definition.eventAllowed(event, this.#state, includeDefault);
	}

	#getNotifyData(event: TEvent | null): PublishedState<TState, TEvent> {
		return {
			current: this.#state,
			previous: this.#previous,
			event,
		};
	}

	/**
	 * Subscribes to handled events.
	 * The callback is invoked immediately with the current state and after
	 * every successfully handled event, internal ones included (actions may
	 * have changed the context).
	 *
	 * @returns Unsubscriber function to stop receiving updates
	 *
	 * @example
	 * ```typescript
	 * const unsub = fsm.subscribe(({ current, previous, event }) => {
	 *   console.log(`${event}: ${previous} -> ${current}`);
	 * });
	 * ```
	 */
	subscribe(cb: (data: PublishedState<TState, TEvent>) => void): Unsubscribe {
		this.#debugLog("subscribe() called");
		const unsub = this.#pubsub.subscribe("change", cb);
		cb(this.#getNotifyData(null));
		return () => {
			unsub();
		};
	}

	/**
	 * Sends `event` to the FSM. `args` are passed to the guards and to the
	 * selected action and hooks, unchecked.
	 *
	 * Execution order during external transitions:
	 * 1. exit hook of the current state, then the global exit hook
	 * 2. `action` of the transition
	 * 3. state changes
	 * 4. entry hook of the new state, then the global entry hook
	 * 5. subscribers notified
	 *
	 * Errors thrown by guards, actions or hooks propagate unchanged and the
	 * remaining steps are skipped. The state only changes if step 3 was reached.
	 *
	 * @throws EventNotAllowedError if no rule matches; the state is unchanged
	 * @throws ReentrantEventError if called while this instance handles an event
	 *
	 * @example
	 * ```typescript
	 * fsm.sendEvent("coin");
	 * fsm.sendEvent("pay", 50, "EUR");
	 * ```
	 */
	sendEvent(event: TEvent, ...args: FSMArgs): void {
		if (this.#dispatching) {
			throw new ReentrantEventError(event);
		}
		this.#debugLog(
			`sendEvent("${String(event)}") called from state "${String(this.#state)}"`
		);

		this.#dispatching = true;
		try {
			this.#dispatch(event, args);
		} finally {
			this.#dispatching = false;
		}

		this.#pubsub.publish("change", this.#getNotifyData(event));
	}

	#dispatch(event: TEvent, args: FSMArgs): void {
		let rule: ResolvedRule<TState, TEvent, TContext>;
		try {
			rule = this.definition.resolve(this.#state, event, this.context, args);
		} catch (e) {
			if (e instanceof EventNotAllowedError) {
				this.#debugLog(`sendEvent("${String(event)}") failed: no matching rule`);
			}
			throw e;
		}
		this.#debugLog(`sendEvent("${String(event)}") resolved to ${rule.kind}`);

		switch (rule.kind) {
			case "transition":
			case "defaultTransition": {
				const { target, action } = rule.transition;
				if (target === undefined) {
					// INTERNAL TRANSITION
					this.#debugLog(`sendEvent("${String(event)}") internal (no state change)`);
					action?.(this.context, ...args);
					return;
				}
				this.#external(event, target, action, args);
				return;
			}
			case "stateDefault":
			case "globalDefault":
				this.#debugLog(`sendEvent("${String(event)}") executing ${rule.kind} action`);
				rule.action(this.context, this.#state, event, ...args);
				return;
		}
	}

	#external(
		event: TEvent,
		target: TState,
		action: StateAction<TContext> | undefined,
		args: FSMArgs
	): void {
		const source = this.#state;
		this.#debugLog(
			`sendEvent("${String(event)}"): "${String(source)}" -> "${String(target)}"`
		);

		// 1. exit current state side-effects
		for (const exit of this.definition.exitActionsFor(source)) {
			this.#debugLog(
				`sendEvent("${String(event)}") executing ${exit.scope} exit for "${String(source)}"`
			);
			exit.action(this.context, source, target, ...args);
		}

		// 2. execute transition action (if defined)
		if (action) {
			this.#debugLog(`sendEvent("${String(event)}") executing action`);
			action(this.context, ...args);
		}

		// 3. save previous and set new state
		this.#previous = source;
		this.#state = target;

		// 4. enter new state side-effects
		for (const entry of this.definition.entryActionsFor(target)) {
			this.#debugLog(
				`sendEvent("${String(event)}") executing ${entry.scope} entry for "${String(target)}"`
			);
			entry.action(this.context, source, target, ...args);
		}
	}
}
