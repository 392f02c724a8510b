import { ConfigurationError, EventNotAllowedError } from "./errors.ts";
import { StateMachineInstance } from "./instance.ts";
import { defaultLogger, type Logger } from "./logger.ts";
import type {
	ChangeAction,
	DefaultStateAction,
	DefaultTransition,
	FSMArgs,
	FSMKey,
	ResolvedRule,
	StateMachineOptions,
	StateQuery,
	TransitionRules,
} from "./types.ts";

/**
 * Read-only snapshot of everything a builder accumulated.
 * Rules are keyed by state first, then by event.
 */
export type DefinitionTable<TState, TEvent, TContext> = {
	readonly initialState?: StateQuery<TContext, TState>;
	readonly transitionRules: ReadonlyMap<
		TState,
		ReadonlyMap<TEvent, TransitionRules<TState, TEvent, TContext>>
	>;
	readonly defaultTransitions: ReadonlyMap<
		TEvent,
		DefaultTransition<TState, TEvent, TContext>
	>;
	readonly entryActions: ReadonlyMap<TState, ChangeAction<TContext, TState>>;
	readonly exitActions: ReadonlyMap<TState, ChangeAction<TContext, TState>>;
	readonly defaultActions: ReadonlyMap<
		TState,
		DefaultStateAction<TContext, TState, TEvent>
	>;
	readonly globalDefault?: DefaultStateAction<TContext, TState, TEvent>;
	readonly defaultEntry?: ChangeAction<TContext, TState>;
	readonly defaultExit?: ChangeAction<TContext, TState>;
};

/** Entry or exit hook together with where it was registered. */
export type StateHook<TContext, TState> = {
	scope: "state" | "global";
	action: ChangeAction<TContext, TState>;
};

/**
 * Immutable transition table produced by `StateMachineBuilder.complete()`.
 *
 * A definition never changes after construction, so one definition can back
 * any number of instances.
 *
 * @template TState - Union type (or enum) of all possible states
 * @template TEvent - Union type (or enum) of all possible events
 * @template TContext - Type of the context the actions operate on
 */
export class StateMachineDefinition<
	TState extends FSMKey,
	TEvent extends FSMKey,
	TContext = unknown
> {
	readonly #table: DefinitionTable<TState, TEvent, TContext>;

	/** Every event this definition knows of, in first-seen order. */
	readonly #knownEvents: ReadonlySet<TEvent>;

	readonly #logger: Logger;

	readonly #debug: boolean;

	constructor(
		table: DefinitionTable<TState, TEvent, TContext>,
		options: StateMachineOptions<TEvent> = {}
	) {
		this.#table = table;
		this.#debug = options.debug ?? false;
		this.#logger = options.logger ?? defaultLogger;

		const known = new Set<TEvent>(options.events ?? []);
		for (const byEvent of table.transitionRules.values()) {
			for (const event of byEvent.keys()) known.add(event);
		}
		for (const event of table.defaultTransitions.keys()) known.add(event);
		this.#knownEvents = known;
	}

	/** Returns whether debug mode is enabled for instances of this definition. */
	get debug(): boolean {
		return this.#debug;
	}

	/** Returns the logger shared by instances of this definition. */
	get logger(): Logger {
		return this.#logger;
	}

	/** Whether an initial state function was configured. */
	get hasInitialState(): boolean {
		return this.#table.initialState !== undefined;
	}

	/** Exit hooks of `state`, specific before global. */
	exitActionsFor(state: TState): StateHook<TContext, TState>[] {
		return this.#hooks(
			this.#table.exitActions.get(state),
			this.#table.defaultExit
		);
	}

	/** Entry hooks of `state`, specific before global. */
	entryActionsFor(state: TState): StateHook<TContext, TState>[] {
		return this.#hooks(
			this.#table.entryActions.get(state),
			this.#table.defaultEntry
		);
	}

	#hooks(
		specific: ChangeAction<TContext, TState> | undefined,
		global: ChangeAction<TContext, TState> | undefined
	): StateHook<TContext, TState>[] {
		const hooks: StateHook<TContext, TState>[] = [];
		if (specific) hooks.push({ scope: "state", action: specific });
		if (global) hooks.push({ scope: "global", action: global });
		return hooks;
	}

	/**
	 * Determines which single rule handles `event` in `state`.
	 *
	 * Order, first match wins:
	 * 1. guarded transitions for (state, event), guards evaluated in declaration order
	 * 2. the unguarded transition for (state, event)
	 * 3. the default transition for the event
	 * 4. the default action of the state
	 * 5. the global default action
	 *
	 * Guards run against the live context with `args`; nothing else is called.
	 *
	 * @throws EventNotAllowedError when nothing matches
	 */
	resolve(
		state: TState,
		event: TEvent,
		context: TContext,
		args: FSMArgs = []
	): ResolvedRule<TState, TEvent, TContext> {
		const rules = this.#table.transitionRules.get(state)?.get(event);
		if (rules) {
			for (const transition of rules.guarded) {
				if (transition.guard(context, ...args)) {
					return { kind: "transition", transition };
				}
			}
			if (rules.simple) {
				return { kind: "transition", transition: rules.simple };
			}
		}

		const defaultTransition = this.#table.defaultTransitions.get(event);
		if (defaultTransition) {
			return { kind: "defaultTransition", transition: defaultTransition };
		}

		const stateDefault = this.#table.defaultActions.get(state);
		if (stateDefault) {
			return { kind: "stateDefault", action: stateDefault };
		}

		if (this.#table.globalDefault) {
			return { kind: "globalDefault", action: this.#table.globalDefault };
		}

		throw new EventNotAllowedError(state, event);
	}

	/** Whether `state` (or the whole machine) has a default action. */
	#hasDefaultAction(state: TState): boolean {
		return (
			this.#table.defaultActions.has(state) ||
			this.#table.globalDefault !== undefined
		);
	}

	/**
	 * Events that have at least one rule from `state`. Guards are not
	 * evaluated: guarded events are reported as allowed even if no guard
	 * would currently pass.
	 *
	 * With `includeDefaults`, adds every event with a default transition and,
	 * when a state or global default action exists, every known event.
	 *
	 * Known events are the `events` builder option plus every event named by a
	 * rule. A default action also accepts events outside that set, which
	 * `eventAllowed(event, state, true)` and `sendEvent` honour but this set
	 * cannot list; declare `events` to report the full domain.
	 */
	allowed(state: TState, includeDefaults = false): Set<TEvent> {
		const result = new Set<TEvent>();
		const byEvent = this.#table.transitionRules.get(state);
		if (byEvent) {
			for (const [event, rules] of byEvent) {
				if (rules.guarded.length || rules.simple) result.add(event);
			}
		}
		if (includeDefaults) {
			if (this.#hasDefaultAction(state)) {
				for (const event of this.#knownEvents) result.add(event);
			} else {
				for (const event of this.#table.defaultTransitions.keys()) {
					result.add(event);
				}
			}
		}
		return result;
	}

	/**
	 * Boolean form of `allowed` for a single event. Unlike `allowed`, it needs
	 * no event domain: with `includeDefault`, any event is allowed where a
	 * state or global default action applies.
	 */
	eventAllowed(event: TEvent, state: TState, includeDefault = false): boolean {
		const rules = this.#table.transitionRules.get(state)?.get(event);
		if (rules && (rules.guarded.length || rules.simple)) return true;
		if (!includeDefault) return false;
		return (
			this.#table.defaultTransitions.has(event) ||
			this.#hasDefaultAction(state)
		);
	}

	/**
	 * Binds this definition to a context.
	 *
	 * @param context - Caller owned value passed to every guard and action
	 * @param initialState - Overrides the configured initial state function
	 * @throws ConfigurationError if neither is available
	 *
	 * @example
	 * ```typescript
	 * const fsm = definition.create(new Turnstile());
	 * fsm.sendEvent("coin");
	 * ```
	 */
	create(
		context: TContext,
		initialState?: TState
	): StateMachineInstance<TState, TEvent, TContext> {
		let state = initialState;
		if (state === undefined) {
			if (!this.#table.initialState) {
				// prettier-ignore
				throw new ConfigurationError("No initial state given and no initial state function defined");
			}
			state = this.#table.initialState(context);
		}
		return new StateMachineInstance(this, context, state);
	}
}
