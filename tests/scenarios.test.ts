import { expect, test } from "vitest";
import { createStateMachine, EventNotAllowedError } from "../src/mod.ts";

test("fetch retry definition", () => {
	type STATES = "IDLE" | "FETCHING" | "RETRYING" | "SUCCESS" | "FAILED";
	type EVENTS = "fetch" | "resolve" | "reject" | "retry" | "reset";
	type CONTEXT = {
		attempts: number;
		maxRetries: number;
		data: unknown;
		error: unknown;
	};

	const log: string[] = [];

	const definition = createStateMachine<STATES, EVENTS, CONTEXT>()
		.stateMachine((sm) => {
			sm.initial(() => "IDLE");
			sm.state("IDLE", (s) => {
				s.on("fetch", { target: "FETCHING" });
			});
			sm.state("FETCHING", (s) => {
				s.entry((ctx) => {
					ctx.attempts += 1;
				});
				s.on("resolve", { target: "SUCCESS" });
				// guarded transitions - first passing guard wins
				s.on("reject", {
					target: "RETRYING",
					guard: (ctx) => ctx.attempts < ctx.maxRetries,
					action: (ctx) => {
						log.push(`Attempt ${ctx.attempts} failed, retrying...`);
					},
				});
				s.on("reject", {
					target: "FAILED",
					guard: (ctx) => ctx.attempts >= ctx.maxRetries,
				});
			});
			sm.state("RETRYING", (s) => {
				s.on("retry", { target: "FETCHING" });
			});
			sm.state("SUCCESS", (s) => {
				s.entry((ctx, _from, _to, data) => {
					ctx.data = data;
				});
			});
			sm.state("FAILED", (s) => {
				s.entry((ctx, _from, _to, error) => {
					ctx.error = error;
				});
			});
			sm.default("reset", { target: "IDLE" });
		})
		.build();

	const newContext = (): CONTEXT => ({
		attempts: 0,
		maxRetries: 2,
		data: null,
		error: null,
	});

	const fsm = definition.create(newContext());
	expect(fsm.is("IDLE")).toBe(true);

	fsm.sendEvent("fetch");
	fsm.sendEvent("reject");
	expect(fsm.currentState).toBe("RETRYING");
	fsm.sendEvent("retry");
	expect(fsm.currentState).toBe("FETCHING");

	expect(log).toEqual(["Attempt 1 failed, retrying..."]);

	// now must not be retrying anymore as the max retry 2 count was reached
	fsm.sendEvent("reject", "some error");
	expect(fsm.currentState).toBe("FAILED");

	// so retry is no more available
	expect(() => fsm.sendEvent("retry")).toThrow(EventNotAllowedError);

	expect(fsm.context).toEqual({
		attempts: 2,
		maxRetries: 2,
		data: null,
		error: "some error",
	});

	fsm.sendEvent("reset");
	expect(fsm.is("IDLE")).toBe(true);

	// a fresh instance starts over
	const again = definition.create(newContext());
	again.sendEvent("fetch");
	again.sendEvent("resolve", { foo: "bar" });
	expect(again.currentState).toBe("SUCCESS");
	expect(again.context.attempts).toBe(1);
	expect(again.context.data).toEqual({ foo: "bar" });
});

test("internal action (no target)", () => {
	type STATES = "PLAYING" | "PAUSED";
	type EVENTS = "pause" | "volume_up";
	type CONTEXT = { volume: number };

	const log: string[] = [];

	const definition = createStateMachine<STATES, EVENTS, CONTEXT>()
		.stateMachine((sm) => {
			sm.state("PLAYING", (s) => {
				s.entry(() => log.push("enter:PLAYING"));
				s.exit(() => log.push("exit:PLAYING"));
				s.on("pause", { target: "PAUSED" });
				// internal transition: No 'target' defined
				s.on("volume_up", (ctx) => {
					ctx.volume += 1;
					log.push(`volume:${ctx.volume}`);
				});
			});
			sm.state("PAUSED", (s) => {
				s.entry(() => log.push("enter:PAUSED"));
				s.exit(() => log.push("exit:PAUSED"));
				// external transition (re-entry): explicit 'target' defined
				// this SHOULD trigger exit/enter hooks
				s.on("volume_up", {
					target: "PAUSED",
					action: (ctx) => {
						ctx.volume += 1;
						log.push(`volume:${ctx.volume}`);
					},
				});
			});
		})
		.build();

	const fsm = definition.create({ volume: 5 }, "PLAYING");

	// 1. internal transition (PLAYING)
	// action must run, but NO enter/exit logs
	fsm.sendEvent("volume_up");
	expect(fsm.currentState).toBe("PLAYING");
	expect(fsm.context.volume).toBe(6);
	expect(log).toEqual(["volume:6"]);

	// 2. switch state to verify standard behavior
	fsm.sendEvent("pause");
	expect(fsm.currentState).toBe("PAUSED");
	expect(log).toEqual(["volume:6", "exit:PLAYING", "enter:PAUSED"]);
	log.length = 0; // clear log

	// 3. external self-transition (PAUSED)
	// action must run, AND enter/exit logs run (because target is explicit)
	fsm.sendEvent("volume_up");
	expect(fsm.currentState).toBe("PAUSED");
	expect(fsm.context.volume).toBe(7);
	expect(log).toEqual(["exit:PAUSED", "volume:7", "enter:PAUSED"]);
});
