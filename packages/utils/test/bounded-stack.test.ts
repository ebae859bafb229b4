import { describe, expect, it } from "vitest";
import { BoundedStack } from "../src/bounded-stack";

describe("construction", () => {
	it("starts empty", () => {
		const stack = new BoundedStack<number>(3);
		expect(stack.length).toBe(0);
		expect(stack.isEmpty).toBe(true);
		expect(stack.pop()).toBeUndefined();
		expect(stack.peek()).toBeUndefined();
	});

	it("rejects a non-positive capacity", () => {
		expect(() => new BoundedStack<number>(0)).toThrow(RangeError);
		expect(() => new BoundedStack<number>(1.5)).toThrow(RangeError);
	});
});

describe("push/pop", () => {
	it("pops in reverse push order", () => {
		const stack = new BoundedStack<string>(4);
		stack.push("a");
		stack.push("b");
		stack.push("c");
		expect(stack.peek()).toBe("c");
		expect(stack.pop()).toBe("c");
		expect(stack.pop()).toBe("b");
		expect(stack.length).toBe(1);
	});

	it("discards the oldest item when full", () => {
		const stack = new BoundedStack<number>(3);
		expect(stack.push(1)).toBeUndefined();
		stack.push(2);
		stack.push(3);
		expect(stack.push(4)).toBe(1);
		expect(stack.push(5)).toBe(2);
		expect(stack.toArray()).toEqual([3, 4, 5]);
		expect(stack.pop()).toBe(5);
		expect(stack.pop()).toBe(4);
		expect(stack.pop()).toBe(3);
		expect(stack.pop()).toBeUndefined();
	});

	it("keeps working after wrapping and draining", () => {
		const stack = new BoundedStack<number>(2);
		for (let i = 0; i < 7; i++) stack.push(i);
		expect(stack.toArray()).toEqual([5, 6]);
		stack.pop();
		stack.push(9);
		expect(stack.toArray()).toEqual([5, 9]);
	});
});

describe("clear", () => {
	it("empties the stack", () => {
		const stack = new BoundedStack<number>(2);
		stack.push(1);
		stack.clear();
		expect(stack.isEmpty).toBe(true);
		expect(stack.toArray()).toEqual([]);
	});
});
