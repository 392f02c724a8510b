import { StateMachineDefinition, type DefinitionTable } from "./definition.ts";
import { StateMachineDsl } from "./dsl.ts";
import { ConfigurationError } from "./errors.ts";
import type {
	ChangeAction,
	DefaultStateAction,
	DefaultTransition,
	DefaultTransitionOptions,
	FSMKey,
	GuardedTransition,
	SimpleTransition,
	StateAction,
	StateMachineOptions,
	StateQuery,
	TransitionOptions,
	TransitionRules,
} from "./types.ts";

type MutableRules<TState, TEvent, TContext> = {
	guarded: GuardedTransition<TState, TEvent, TContext>[];
	simple?: SimpleTransition<TState, TEvent, TContext>;
};

/**
 * Transition declaration: either a full options object, or just an action
 * (which makes an unguarded internal transition).
 */
export type TransitionDef<TState, TContext> =
	| TransitionOptions<TState, TContext>
	| StateAction<TContext>;

/**
 * Factory function to create a builder.
 * Equivalent to calling `new StateMachineBuilder(options)`.
 *
 * @example
 * ```typescript
 * const definition = createStateMachine<"ON" | "OFF", "toggle", Lamp>()
 *   .initial((lamp) => (lamp.lit ? "ON" : "OFF"))
 *   .transition("OFF", "toggle", { target: "ON", action: (l) => l.switchOn() })
 *   .transition("ON", "toggle", { target: "OFF", action: (l) => l.switchOff() })
 *   .complete();
 * ```
 */
export function createStateMachine<
	TState extends FSMKey,
	TEvent extends FSMKey,
	TContext = unknown
>(
	options: StateMachineOptions<TEvent> = {}
): StateMachineBuilder<TState, TEvent, TContext> {
	return new StateMachineBuilder<TState, TEvent, TContext>(options);
}

/**
 * Mutable accumulator of transition rules.
 *
 * Every configuration method validates its own cardinality rule and throws a
 * `ConfigurationError` right away. `complete()` copies everything into an
 * immutable `StateMachineDefinition`; the builder is inert afterwards.
 *
 * @template TState - Union type (or enum) of all possible states
 * @template TEvent - Union type (or enum) of all possible events
 * @template TContext - Type of the context the actions operate on
 */
export class StateMachineBuilder<
	TState extends FSMKey,
	TEvent extends FSMKey,
	TContext = unknown
> {
	#completed = false;

	#initialState: StateQuery<TContext, TState> | undefined;

	#transitionRules = new Map<
		TState,
		Map<TEvent, MutableRules<TState, TEvent, TContext>>
	>();

	#defaultTransitions = new Map<
		TEvent,
		DefaultTransition<TState, TEvent, TContext>
	>();

	#entryActions = new Map<TState, ChangeAction<TContext, TState>>();

	#exitActions = new Map<TState, ChangeAction<TContext, TState>>();

	#defaultActions = new Map<
		TState,
		DefaultStateAction<TContext, TState, TEvent>
	>();

	#globalDefault: DefaultStateAction<TContext, TState, TEvent> | undefined;

	#defaultEntry: ChangeAction<TContext, TState> | undefined;

	#defaultExit: ChangeAction<TContext, TState> | undefined;

	constructor(
		public readonly options: StateMachineOptions<TEvent> = {}
	) {}

	/** Whether `complete()` has already been called. */
	get completed(): boolean {
		return this.#completed;
	}

	#assertNotCompleted() {
		if (this.#completed) {
			throw new ConfigurationError(
				"State machine definition has been completed"
			);
		}
	}

	#rulesFor(
		state: TState,
		event: TEvent
	): MutableRules<TState, TEvent, TContext> {
		let byEvent = this.#transitionRules.get(state);
		if (!byEvent) {
			byEvent = new Map();
			this.#transitionRules.set(state, byEvent);
		}
		let rules = byEvent.get(event);
		if (!rules) {
			rules = { guarded: [] };
			byEvent.set(event, rules);
		}
		return rules;
	}

	/**
	 * Registers a transition for `event` received in `state`.
	 *
	 * With a `guard` the transition is appended to the key's guarded list,
	 * whose guards are evaluated in declaration order. Without one it becomes
	 * the key's single unguarded transition, tried only after every guard
	 * failed. A `target` makes the transition external (exit/entry hooks run,
	 * even when target equals `state`); no target makes it internal.
	 *
	 * @throws ConfigurationError if an unguarded transition for the key exists
	 *
	 * @example
	 * ```typescript
	 * builder
	 *   .transition("LOCKED", "coin", { target: "UNLOCKED", action: (t) => t.unlock() })
	 *   .transition("UNLOCKED", "coin", (t) => t.thankYou());
	 * ```
	 */
	transition(
		state: TState,
		event: TEvent,
		def: TransitionDef<TState, TContext>
	): this {
		this.#assertNotCompleted();
		const { target, guard, action } =
			typeof def === "function"
				? { target: undefined, guard: undefined, action: def }
				: def;
		const rules = this.#rulesFor(state, event);

		if (guard) {
			rules.guarded.push({
				kind: "guarded",
				startState: state,
				event,
				target,
				guard,
				action,
			});
			return this;
		}

		if (rules.simple) {
			// prettier-ignore
			throw new ConfigurationError(`Unguarded transition for "${String(state)}" on "${String(event)}" already defined`);
		}
		rules.simple = { kind: "simple", startState: state, event, target, action };
		return this;
	}

	/**
	 * Registers a fallback for `event` used from any state that has no guarded
	 * or unguarded rule matching it.
	 *
	 * @throws ConfigurationError if the event already has a default transition
	 */
	defaultTransition(
		event: TEvent,
		def: DefaultTransitionOptions<TState, TContext> | StateAction<TContext> = {}
	): this {
		this.#assertNotCompleted();
		if (this.#defaultTransitions.has(event)) {
			// prettier-ignore
			throw new ConfigurationError(`Default transition for "${String(event)}" already defined`);
		}
		const { target, action } =
			typeof def === "function" ? { target: undefined, action: def } : def;
		this.#defaultTransitions.set(event, { event, target, action });
		return this;
	}

	/**
	 * Registers the global last resort action. It runs as an internal
	 * transition: no state change, no entry/exit hooks.
	 */
	defaultAction(action: DefaultStateAction<TContext, TState, TEvent>): this {
		this.#assertNotCompleted();
		if (this.#globalDefault) {
			throw new ConfigurationError("Global default action already defined");
		}
		this.#globalDefault = action;
		return this;
	}

	/** Registers the last resort action for one state. */
	default(
		state: TState,
		action: DefaultStateAction<TContext, TState, TEvent>
	): this {
		this.#assertNotCompleted();
		if (this.#defaultActions.has(state)) {
			// prettier-ignore
			throw new ConfigurationError(`Default action already defined for "${String(state)}"`);
		}
		this.#defaultActions.set(state, action);
		return this;
	}

	/** Registers the action run when an external transition enters `state`. */
	entry(state: TState, action: ChangeAction<TContext, TState>): this {
		this.#assertNotCompleted();
		if (this.#entryActions.has(state)) {
			// prettier-ignore
			throw new ConfigurationError(`Entry action already defined for "${String(state)}"`);
		}
		this.#entryActions.set(state, action);
		return this;
	}

	/** Registers the action run when an external transition leaves `state`. */
	exit(state: TState, action: ChangeAction<TContext, TState>): this {
		this.#assertNotCompleted();
		if (this.#exitActions.has(state)) {
			// prettier-ignore
			throw new ConfigurationError(`Exit action already defined for "${String(state)}"`);
		}
		this.#exitActions.set(state, action);
		return this;
	}

	/** Entry action for every state, run after the state specific one. */
	defaultEntry(action: ChangeAction<TContext, TState>): this {
		this.#assertNotCompleted();
		if (this.#defaultEntry) {
			throw new ConfigurationError("Default entry action already defined");
		}
		this.#defaultEntry = action;
		return this;
	}

	/** Exit action for every state, run after the state specific one. */
	defaultExit(action: ChangeAction<TContext, TState>): this {
		this.#assertNotCompleted();
		if (this.#defaultExit) {
			throw new ConfigurationError("Default exit action already defined");
		}
		this.#defaultExit = action;
		return this;
	}

	/**
	 * Sets how an instance derives its starting state from its context.
	 * Last call wins.
	 */
	initial(fn: StateQuery<TContext, TState>): this {
		this.#assertNotCompleted();
		this.#initialState = fn;
		return this;
	}

	/**
	 * Configures this builder through the nested DSL.
	 *
	 * @example
	 * ```typescript
	 * const definition = createStateMachine<S, E, Turnstile>()
	 *   .stateMachine((sm) => {
	 *     sm.initial((t) => (t.locked ? "LOCKED" : "UNLOCKED"));
	 *     sm.state("LOCKED", (s) => {
	 *       s.on("coin", { target: "UNLOCKED", action: (t) => t.unlock() });
	 *     });
	 *   })
	 *   .build();
	 * ```
	 */
	stateMachine(
		handler: (dsl: StateMachineDsl<TState, TEvent, TContext>) => void
	): StateMachineDsl<TState, TEvent, TContext> {
		this.#assertNotCompleted();
		const dsl = new StateMachineDsl<TState, TEvent, TContext>(this);
		handler(dsl);
		return dsl;
	}

	/**
	 * Freezes the builder and returns the immutable definition. Stored rules
	 * are frozen as well, so nothing reachable from the definition (e.g. a
	 * rule returned by `resolve()`) can be modified.
	 * Any later mutating call (including another `complete()`) throws.
	 */
	complete(): StateMachineDefinition<TState, TEvent, TContext> {
		this.#assertNotCompleted();
		this.#completed = true;

		const transitionRules = new Map<
			TState,
			ReadonlyMap<TEvent, TransitionRules<TState, TEvent, TContext>>
		>();
		for (const [state, byEvent] of this.#transitionRules) {
			const copy = new Map<TEvent, TransitionRules<TState, TEvent, TContext>>();
			for (const [event, rules] of byEvent) {
				copy.set(
					event,
					Object.freeze({
						guarded: Object.freeze(rules.guarded.map((t) => Object.freeze(t))),
						simple: rules.simple && Object.freeze(rules.simple),
					})
				);
			}
			transitionRules.set(state, copy);
		}

		const defaultTransitions = new Map<
			TEvent,
			DefaultTransition<TState, TEvent, TContext>
		>();
		for (const [event, transition] of this.#defaultTransitions) {
			defaultTransitions.set(event, Object.freeze(transition));
		}

		const table: DefinitionTable<TState, TEvent, TContext> = {
			initialState: this.#initialState,
			transitionRules,
			defaultTransitions,
			entryActions: new Map(this.#entryActions),
			exitActions: new Map(this.#exitActions),
			defaultActions: new Map(this.#defaultActions),
			globalDefault: this.#globalDefault,
			defaultEntry: this.#defaultEntry,
			defaultExit: this.#defaultExit,
		};

		return new StateMachineDefinition(table, this.options);
	}

	/** Alias of `complete()`. */
	build(): StateMachineDefinition<TState, TEvent, TContext> {
		return this.complete();
	}
}
