import type { StateMachineBuilder, TransitionDef } from "./builder.ts";
import type { StateMachineDefinition } from "./definition.ts";
import type {
	ChangeAction,
	DefaultStateAction,
	DefaultTransitionOptions,
	FSMKey,
	StateAction,
	StateQuery,
} from "./types.ts";

/**
 * Machine level handler of the nested configuration style. Obtained from
 * `StateMachineBuilder.stateMachine()`; every call forwards to the builder,
 * so the same cardinality rules (and errors) apply.
 */
export class StateMachineDsl<
	TState extends FSMKey,
	TEvent extends FSMKey,
	TContext = unknown
> {
	constructor(
		readonly builder: StateMachineBuilder<TState, TEvent, TContext>
	) {}

	initial(fn: StateQuery<TContext, TState>): this {
		this.builder.initial(fn);
		return this;
	}

	/** Configures the rules leaving `state`. */
	state(
		state: TState,
		handler: (dsl: StateDsl<TState, TEvent, TContext>) => void
	): this {
		handler(new StateDsl(this.builder, state));
		return this;
	}

	/** Fallback used from any state for `event`. */
	default(
		event: TEvent,
		def?: DefaultTransitionOptions<TState, TContext> | StateAction<TContext>
	): this {
		this.builder.defaultTransition(event, def);
		return this;
	}

	defaultAction(action: DefaultStateAction<TContext, TState, TEvent>): this {
		this.builder.defaultAction(action);
		return this;
	}

	defaultEntry(action: ChangeAction<TContext, TState>): this {
		this.builder.defaultEntry(action);
		return this;
	}

	defaultExit(action: ChangeAction<TContext, TState>): this {
		this.builder.defaultExit(action);
		return this;
	}

	/** Completes the underlying builder. */
	build(): StateMachineDefinition<TState, TEvent, TContext> {
		return this.builder.complete();
	}
}

/** State level handler: every rule it declares leaves `state`. */
export class StateDsl<
	TState extends FSMKey,
	TEvent extends FSMKey,
	TContext = unknown
> {
	constructor(
		readonly builder: StateMachineBuilder<TState, TEvent, TContext>,
		readonly state: TState
	) {}

	/**
	 * Declares a transition for `event`.
	 *
	 * @example
	 * ```typescript
	 * s.on("coin", { target: "UNLOCKED", action: (t) => t.unlock() });
	 * s.on("coin", { guard: (t) => t.broken, action: (t) => t.refund() });
	 * s.on("pass", (t) => t.alarm());
	 * ```
	 */
	on(event: TEvent, def: TransitionDef<TState, TContext>): this {
		this.builder.transition(this.state, event, def);
		return this;
	}

	entry(action: ChangeAction<TContext, TState>): this {
		this.builder.entry(this.state, action);
		return this;
	}

	exit(action: ChangeAction<TContext, TState>): this {
		this.builder.exit(this.state, action);
		return this;
	}

	/** Last resort action for events nothing else in this state handles. */
	default(action: DefaultStateAction<TContext, TState, TEvent>): this {
		this.builder.default(this.state, action);
		return this;
	}
}
