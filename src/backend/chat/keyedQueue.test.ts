import { describe, expect, it } from 'vitest';
import { KeyedQueue } from './keyedQueue';

function deferred(): { promise: Promise<void>; resolve: () => void } {
	let resolve: () => void = () => {};
	const promise = new Promise<void>((r) => {
		resolve = () => r();
	});
	return { promise, resolve };
}

describe('KeyedQueue', () => {
	it('runs tasks with the same key one at a time', async () => {
		const queue = new KeyedQueue();
		const events: string[] = [];
		const gate = deferred();

		const first = queue.run('s1', async () => {
			events.push('first:start');
			await gate.promise;
			events.push('first:end');
			return 1;
		});
		const second = queue.run('s1', async () => {
			events.push('second:start');
			return 2;
		});

		await Promise.resolve();
		expect(events).toEqual(['first:start']);
		gate.resolve();
		expect(await Promise.all([first, second])).toEqual([1, 2]);
		expect(events).toEqual(['first:start', 'first:end', 'second:start']);
	});

	it('does not hold back other keys', async () => {
		const queue = new KeyedQueue();
		const gate = deferred();
		const blocked = queue.run('a', () => gate.promise.then(() => 'a'));
		await expect(queue.run('b', async () => 'b')).resolves.toBe('b');
		gate.resolve();
		await expect(blocked).resolves.toBe('a');
	});

	it('keeps going after a task fails', async () => {
		const queue = new KeyedQueue();
		const failed = queue.run('k', async () => {
			throw new Error('boom');
		});
		const next = queue.run('k', async () => 'recovered');
		await expect(failed).rejects.toThrow('boom');
		await expect(next).resolves.toBe('recovered');
	});

	it('forgets keys once drained', async () => {
		const queue = new KeyedQueue();
		await queue.run('k', async () => undefined);
		await new Promise((resolve) => setTimeout(resolve, 0));
		expect(queue.pendingKeys).toBe(0);
	});
});
