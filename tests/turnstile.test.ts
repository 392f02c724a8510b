import { expect, test, vi } from "vitest";
import { createStateMachine } from "../src/mod.ts";
import type { StateMachineInstance } from "../src/mod.ts";

type STATES = "LOCKED" | "UNLOCKED";
type EVENTS = "COIN" | "PASS";

class Turnstile {
	locked = true;
	unlock = vi.fn(() => {
		this.locked = false;
	});
	lock = vi.fn(() => {
		this.locked = true;
	});
	thankYou = vi.fn();
	alarm = vi.fn();
}

const plainDefinition = () =>
	createStateMachine<STATES, EVENTS, Turnstile>()
		.initial((t) => (t.locked ? "LOCKED" : "UNLOCKED"))
		.transition("LOCKED", "COIN", {
			target: "UNLOCKED",
			action: (t) => t.unlock(),
		})
		.transition("UNLOCKED", "PASS", {
			target: "LOCKED",
			action: (t) => t.lock(),
		})
		.transition("UNLOCKED", "COIN", (t) => t.thankYou())
		.defaultAction((t) => t.alarm())
		.complete();

const dslDefinition = () =>
	createStateMachine<STATES, EVENTS, Turnstile>()
		.stateMachine((sm) => {
			sm.initial((t) => (t.locked ? "LOCKED" : "UNLOCKED"));
			sm.state("LOCKED", (s) => {
				s.on("COIN", { target: "UNLOCKED", action: (t) => t.unlock() });
			});
			sm.state("UNLOCKED", (s) => {
				s.on("COIN", (t) => t.thankYou());
				s.on("PASS", { target: "LOCKED", action: (t) => t.lock() });
			});
			sm.defaultAction((t) => t.alarm());
		})
		.build();

function verifyTurnstile(
	fsm: StateMachineInstance<STATES, EVENTS, Turnstile>,
	turnstile: Turnstile
) {
	expect(fsm.currentState).toBe("LOCKED");

	fsm.sendEvent("COIN");
	expect(fsm.currentState).toBe("UNLOCKED");
	expect(turnstile.unlock).toHaveBeenCalledTimes(1);

	fsm.sendEvent("COIN");
	expect(fsm.currentState).toBe("UNLOCKED");
	expect(turnstile.thankYou).toHaveBeenCalledTimes(1);

	fsm.sendEvent("PASS");
	expect(fsm.currentState).toBe("LOCKED");
	expect(turnstile.lock).toHaveBeenCalledTimes(1);

	// no LOCKED+PASS rule, falls through to the global default
	fsm.sendEvent("PASS");
	expect(fsm.currentState).toBe("LOCKED");
	expect(turnstile.alarm).toHaveBeenCalledTimes(1);

	expect(turnstile.unlock).toHaveBeenCalledTimes(1);
	expect(turnstile.lock).toHaveBeenCalledTimes(1);
	expect(turnstile.thankYou).toHaveBeenCalledTimes(1);
}

test("turnstile round trip, builder", () => {
	const turnstile = new Turnstile();
	verifyTurnstile(plainDefinition().create(turnstile), turnstile);
});

test("turnstile round trip, nested configuration", () => {
	const turnstile = new Turnstile();
	verifyTurnstile(dslDefinition().create(turnstile), turnstile);
});

test("initial state is derived from the context", () => {
	const turnstile = new Turnstile();
	turnstile.locked = false;
	const fsm = plainDefinition().create(turnstile);
	expect(fsm.currentState).toBe("UNLOCKED");

	// explicit initial state wins over the context
	expect(plainDefinition().create(turnstile, "LOCKED").currentState).toBe(
		"LOCKED"
	);
});

test("allowed events from LOCKED", () => {
	const definition = plainDefinition();
	expect(definition.allowed("LOCKED", true)).toEqual(new Set(["COIN", "PASS"]));
	expect(definition.allowed("LOCKED", false)).toEqual(new Set(["COIN"]));
	expect(definition.allowed("UNLOCKED")).toEqual(new Set(["COIN", "PASS"]));

	const fsm = definition.create(new Turnstile());
	expect(fsm.allowed()).toEqual(new Set(["COIN"]));
	expect(fsm.eventAllowed("PASS")).toBe(false);
	expect(fsm.eventAllowed("PASS", true)).toBe(true);
});

test("one definition, independent instances", () => {
	const definition = plainDefinition();
	const a = new Turnstile();
	const b = new Turnstile();
	const fsmA = definition.create(a);
	const fsmB = definition.create(b);

	fsmA.sendEvent("COIN");

	expect(fsmA.currentState).toBe("UNLOCKED");
	expect(fsmB.currentState).toBe("LOCKED");
	expect(a.unlock).toHaveBeenCalledTimes(1);
	expect(b.unlock).not.toHaveBeenCalled();
});

test("turnstile with entry and exit hooks", () => {
	const log: string[] = [];
	const definition = createStateMachine<STATES, EVENTS, Turnstile>()
		.stateMachine((sm) => {
			sm.initial((t) => (t.locked ? "LOCKED" : "UNLOCKED"));
			sm.state("LOCKED", (s) => {
				s.entry((_t, from, to) => log.push(`enter LOCKED ${from}->${to}`));
				s.on("COIN", { target: "UNLOCKED", action: (t) => t.unlock() });
				s.on("PASS", (t) => t.alarm());
				s.exit((_t, from, to) => log.push(`exit LOCKED ${from}->${to}`));
			});
			sm.state("UNLOCKED", (s) => {
				s.entry((_t, from, to) => log.push(`enter UNLOCKED ${from}->${to}`));
				s.on("COIN", (t) => t.thankYou());
				s.on("PASS", { target: "LOCKED", action: (t) => t.lock() });
				s.exit((_t, from, to) => log.push(`exit UNLOCKED ${from}->${to}`));
			});
		})
		.build();

	const turnstile = new Turnstile();
	const fsm = definition.create(turnstile);

	fsm.sendEvent("COIN");
	expect(turnstile.locked).toBe(false);
	fsm.sendEvent("PASS");
	expect(turnstile.locked).toBe(true);
	fsm.sendEvent("PASS");
	expect(turnstile.locked).toBe(true);
	expect(turnstile.alarm).toHaveBeenCalledTimes(1);
	fsm.sendEvent("COIN");
	fsm.sendEvent("COIN");
	expect(turnstile.locked).toBe(false);
	expect(fsm.currentState).toBe("UNLOCKED");

	expect(log).toEqual([
		"exit LOCKED LOCKED->UNLOCKED",
		"enter UNLOCKED LOCKED->UNLOCKED",
		"exit UNLOCKED UNLOCKED->LOCKED",
		"enter LOCKED UNLOCKED->LOCKED",
		"exit LOCKED LOCKED->UNLOCKED",
		"enter UNLOCKED LOCKED->UNLOCKED",
	]);
});
