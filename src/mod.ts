/**
 * @module
 *
 * A typed, synchronous finite state machine engine.
 *
 * A `StateMachineBuilder` collects transition rules (optionally guarded),
 * default fallbacks and entry/exit hooks, then completes into an immutable
 * `StateMachineDefinition`. Each `create(context)` call binds the definition
 * to one context and returns an independent `StateMachineInstance`.
 *
 * @example Builder
 * ```typescript
 * import { createStateMachine } from "fsm-engine";
 *
 * const definition = createStateMachine<"LOCKED" | "UNLOCKED", "coin" | "pass", Turnstile>()
 *   .initial((t) => (t.locked ? "LOCKED" : "UNLOCKED"))
 *   .transition("LOCKED", "coin", { target: "UNLOCKED", action: (t) => t.unlock() })
 *   .transition("UNLOCKED", "pass", { target: "LOCKED", action: (t) => t.lock() })
 *   .transition("UNLOCKED", "coin", (t) => t.thankYou())
 *   .defaultAction((t) => t.alarm())
 *   .complete();
 *
 * const fsm = definition.create(new Turnstile());
 * fsm.sendEvent("coin");
 * ```
 *
 * @example Nested configuration
 * ```typescript
 * const definition = createStateMachine<S, E, Turnstile>()
 *   .stateMachine((sm) => {
 *     sm.initial((t) => (t.locked ? "LOCKED" : "UNLOCKED"));
 *     sm.state("LOCKED", (s) => {
 *       s.on("coin", { target: "UNLOCKED", action: (t) => t.unlock() });
 *       s.on("pass", (t) => t.alarm());
 *     });
 *   })
 *   .build();
 * ```
 */

export * from "./types.ts";
export * from "./errors.ts";
export * from "./logger.ts";
export * from "./builder.ts";
export * from "./definition.ts";
export * from "./instance.ts";
export * from "./dsl.ts";
