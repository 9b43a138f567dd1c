import { BagOnce } from "../primitives/BagOnce";


test("once", () => {
	const bag = new BagOnce();
	let calls = 0;

	bag.add(() => { ++calls; }).release();
	bag.add(() => { ++calls; }).dispose();

	bag.call(handler => handler());
	expect(calls).toBe(1);

	bag.add(() => { ++calls; }).release();
	bag.callSimple();
	expect(calls).toBe(2);
});

test("second call invokes nothing", () => {
	const bag = new BagOnce();
	let calls = 0;

	const first = bag.add(() => { ++calls; });
	const second = bag.add(() => { ++calls; });

	bag.callSimple();
	expect(calls).toBe(2);
	expect(bag.handlersCount).toBe(0);

	bag.callSimple();
	expect(calls).toBe(2);

	first.dispose();
	second.dispose();
	expect(bag.handlersCount).toBe(0);
});

test("cancelled before firing", () => {
	const bag = new BagOnce<[number]>();
	const received: number[] = [];

	const handle = bag.add(n => { received.push(n); });
	handle.dispose();
	bag.callSimple(1);

	expect(received).toEqual([]);
});

test("handler disposing its own handle during a call", () => {
	const bag = new BagOnce();
	let calls = 0;

	const handle = bag.add(() => {
		++calls;
		handle.dispose();
	});

	bag.callSimple();

	expect(calls).toBe(1);
	expect(handle.disposed).toBe(true);
	expect(bag.handlersCount).toBe(0);
});

test("handler added during a call fires on the next call", () => {
	const bag = new BagOnce();
	const calls: string[] = [];

	bag.add(() => {
		calls.push("first");
		bag.add(() => { calls.push("added"); }).release();
	}).release();

	bag.callSimple();
	expect(calls).toEqual(["first"]);
	expect(bag.handlersCount).toBe(1);

	bag.callSimple();
	expect(calls).toEqual(["first", "added"]);
});

test("reentrant call finds the bag drained", () => {
	const bag = new BagOnce();
	let calls = 0;

	bag.add(() => {
		++calls;
		bag.callSimple();
	}).release();
	bag.add(() => { ++calls; }).release();

	bag.callSimple();

	expect(calls).toBe(2);
});

test("arguments are delivered to every handler", () => {
	const bag = new BagOnce<[number, number]>();
	const received: number[][] = [];

	bag.add((a, b) => { received.push([a, b]); }).release();
	bag.add((a, b) => { received.push([a, b]); }).release();

	bag.call(handler => handler(1, 2));

	expect(received).toEqual([[1, 2], [1, 2]]);
});

test("throwing handler drops the rest of the drained handlers", () => {
	const bag = new BagOnce();
	let calls = 0;

	bag.add(() => { throw new Error("handler failed"); }).release();
	bag.add(() => { ++calls; }).release();

	expect(() => bag.callSimple()).toThrow("handler failed");
	expect(bag.handlersCount).toBe(0);

	bag.callSimple();
	expect(calls).toBe(0);
});

test("clones share handlers", () => {
	const bag = new BagOnce();
	const clone = bag.clone();
	let calls = 0;

	clone.add(() => { ++calls; }).release();
	bag.callSimple();
	clone.callSimple();

	expect(calls).toBe(1);
});

test("verbose bag logs drains", () => {
	const log = jest.spyOn(console, "log").mockImplementation(() => { });
	try {
		const bag = new BagOnce({ name: "closed", verbose: true });

		const handle = bag.add(() => { });
		bag.add(() => { }).release();
		bag.callSimple();
		handle.dispose();

		expect(log.mock.calls).toEqual([
			["closed: handler 0 added"],
			["closed: handler 1 added"],
			["closed: drained 2 handlers"],
		]);
	} finally {
		log.mockRestore();
	}
});
