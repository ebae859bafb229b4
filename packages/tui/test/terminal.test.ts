import { afterEach, describe, expect, it, vi } from "vitest";
import { emergencyTerminalRestore, installTerminalGuards, trackTerminal, untrackTerminal, withTerminal } from "../src/terminal";
import { VirtualTerminal } from "./virtual-terminal";

function listenerCounts(): Record<string, number> {
	return {
		exit: process.listenerCount("exit"),
		uncaughtException: process.listenerCount("uncaughtException"),
		unhandledRejection: process.listenerCount("unhandledRejection"),
		SIGINT: process.listenerCount("SIGINT"),
		SIGTERM: process.listenerCount("SIGTERM"),
		SIGHUP: process.listenerCount("SIGHUP"),
	};
}

afterEach(() => {
	vi.restoreAllMocks();
});

describe("emergencyTerminalRestore", () => {
	it("stops the tracked terminal", () => {
		const terminal = new VirtualTerminal(10, 3);
		terminal.start(
			() => {},
			() => {},
		);
		trackTerminal(terminal);
		try {
			emergencyTerminalRestore();
			expect(terminal.started).toBe(false);
		} finally {
			untrackTerminal(terminal);
		}
	});

	it("does not throw when stopping the terminal fails", () => {
		const terminal = new VirtualTerminal(10, 3);
		const stop = vi.spyOn(terminal, "stop").mockImplementation(() => {
			throw new Error("stdout closed");
		});
		trackTerminal(terminal);
		try {
			expect(() => emergencyTerminalRestore()).not.toThrow();
			expect(stop).toHaveBeenCalledTimes(1);
		} finally {
			untrackTerminal(terminal);
		}
	});
});

describe("installTerminalGuards", () => {
	it("registers exit, signal and crash handlers and removes them again", () => {
		const before = listenerCounts();
		const dispose = installTerminalGuards();
		try {
			const during = listenerCounts();
			for (const [event, count] of Object.entries(before)) {
				expect(during[event]).toBe(count + 1);
			}
		} finally {
			dispose();
		}
		expect(listenerCounts()).toEqual(before);
	});

	it("restores the terminal before exiting on a termination signal", () => {
		const terminal = new VirtualTerminal(10, 3);
		terminal.start(
			() => {},
			() => {},
		);
		trackTerminal(terminal);
		const exit = vi.spyOn(process, "exit").mockImplementation(code => {
			throw new Error(`exit ${String(code)}`);
		});
		const existing = new Set(process.listeners("SIGTERM"));
		const dispose = installTerminalGuards();
		try {
			const handler = process.listeners("SIGTERM").find(listener => !existing.has(listener));
			expect(handler).toBeDefined();
			expect(() => handler?.("SIGTERM")).toThrow("exit 143");
			expect(terminal.started).toBe(false);
			expect(exit).toHaveBeenCalledWith(143);
		} finally {
			dispose();
			untrackTerminal(terminal);
		}
	});

	it("exits with status 1 after an uncaught error", () => {
		vi.spyOn(process.stdout, "write").mockReturnValue(true);
		const stderr = vi.spyOn(process.stderr, "write").mockReturnValue(true);
		vi.spyOn(process, "exit").mockImplementation(code => {
			throw new Error(`exit ${String(code)}`);
		});
		const existing = new Set(process.listeners("uncaughtException"));
		const dispose = installTerminalGuards();
		try {
			const handler = process.listeners("uncaughtException").find(listener => !existing.has(listener));
			expect(() => handler?.(new Error("boom"), "uncaughtException")).toThrow("exit 1");
			expect(stderr).toHaveBeenCalledWith(expect.stringContaining("Error: boom"));
		} finally {
			dispose();
		}
	});
});

describe("withTerminal", () => {
	it("stops the terminal when the body throws", async () => {
		const terminal = new VirtualTerminal(10, 3);
		await expect(
			withTerminal(
				terminal,
				() => {},
				() => {},
				async () => {
					throw new Error("draw failed");
				},
			),
		).rejects.toThrow("draw failed");
		expect(terminal.started).toBe(false);
	});
});
