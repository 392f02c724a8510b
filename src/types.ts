import type { Logger } from "./logger.ts";

/**
 * Anything usable as a state or event identifier. Compared by identity, so
 * string literal unions and enum members both work.
 */
export type FSMKey = string | number | symbol;

/**
 * Arguments forwarded from `sendEvent` to guards and actions. The engine never
 * inspects them.
 */
export type FSMArgs = unknown[];

/** Side effect attached to a transition edge. */
export type StateAction<TContext> = (context: TContext, ...args: FSMArgs) => void;

/**
 * Predicate deciding whether a guarded transition applies.
 * Should only read the context.
 */
export type StateGuard<TContext> = (
	context: TContext,
	...args: FSMArgs
) => boolean;

/** Entry or exit hook, receives both ends of the external transition. */
export type ChangeAction<TContext, TState> = (
	context: TContext,
	startState: TState,
	endState: TState,
	...args: FSMArgs
) => void;

/** Fallback handler invoked when nothing else matched. */
export type DefaultStateAction<TContext, TState, TEvent> = (
	context: TContext,
	state: TState,
	event: TEvent,
	...args: FSMArgs
) => void;

/** Derives the starting state from the context's own data. */
export type StateQuery<TContext, TState> = (context: TContext) => TState;

/**
 * Transition configuration accepted by the builder.
 *
 * `target` is optional... if undefined, the transition is "internal" and only
 * the action runs.
 */
export type TransitionOptions<TState, TContext> = {
	target?: TState;
	guard?: StateGuard<TContext>;
	action?: StateAction<TContext>;
};

/** Same as `TransitionOptions`, minus the guard. */
export type DefaultTransitionOptions<TState, TContext> = {
	target?: TState;
	action?: StateAction<TContext>;
};

type TransitionBase<TState, TEvent, TContext> = {
	readonly startState: TState;
	readonly event: TEvent;
	readonly target?: TState;
	readonly action?: StateAction<TContext>;
};

export type GuardedTransition<TState, TEvent, TContext> = TransitionBase<
	TState,
	TEvent,
	TContext
> & {
	readonly kind: "guarded";
	readonly guard: StateGuard<TContext>;
};

export type SimpleTransition<TState, TEvent, TContext> = TransitionBase<
	TState,
	TEvent,
	TContext
> & {
	readonly kind: "simple";
};

/** Registered transition for a (state, event) key. */
export type Transition<TState, TEvent, TContext> =
	| GuardedTransition<TState, TEvent, TContext>
	| SimpleTransition<TState, TEvent, TContext>;

/** State independent fallback for one event. */
export type DefaultTransition<TState, TEvent, TContext> = {
	readonly event: TEvent;
	readonly target?: TState;
	readonly action?: StateAction<TContext>;
};

/** All rules registered for a single (state, event) key. */
export type TransitionRules<TState, TEvent, TContext> = {
	readonly guarded: readonly GuardedTransition<TState, TEvent, TContext>[];
	readonly simple?: SimpleTransition<TState, TEvent, TContext>;
};

/**
 * Outcome of resolving an event against a state.
 *
 * - `transition`: a guarded or simple rule for the (state, event) key
 * - `defaultTransition`: the event's state independent fallback
 * - `stateDefault` / `globalDefault`: last resort actions, always internal
 */
export type ResolvedRule<TState, TEvent, TContext> =
	| { kind: "transition"; transition: Transition<TState, TEvent, TContext> }
	| {
			kind: "defaultTransition";
			transition: DefaultTransition<TState, TEvent, TContext>;
	  }
	| {
			kind: "stateDefault";
			action: DefaultStateAction<TContext, TState, TEvent>;
	  }
	| {
			kind: "globalDefault";
			action: DefaultStateAction<TContext, TState, TEvent>;
	  };

/** Options accepted by the builder, carried into the definition. */
export type StateMachineOptions<TEvent> = {
	/**
	 * The full event domain. Optional; events named by any rule are known
	 * anyway, but `allowed(state, true)` can only report events it knows about
	 * when a default action covers them.
	 */
	events?: readonly TEvent[];
	/** Enable debug logging (default: false) */
	debug?: boolean;
	/** Custom logger implementing Logger interface (default: console) */
	logger?: Logger;
};

/**
 * Published state data sent to subscribers.
 * `previous` and `event` are null for the initial notification.
 */
export type PublishedState<TState, TEvent> = {
	current: TState;
	previous: TState | null;
	event: TEvent | null;
};

/** Stops a subscription. */
export type Unsubscribe = () => void;
