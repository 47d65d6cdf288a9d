import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { TransportError } from '../experiment/errors.js';
import type { InboundMessage } from '../protocol/messages.js';
import { createFakeSockets } from '../testing/fakes.js';
import type { TransportState } from './transport.js';
import { WebSocketTransport, experimentSocketUrl } from './websocket.js';

const URL = 'ws://lab.test/ws/experiment/7/';

function setup() {
	const fakes = createFakeSockets();
	const transport = new WebSocketTransport({ url: URL, createSocket: fakes.factory });
	const states: TransportState[] = [];
	transport.onStateChange((state) => states.push(state));
	return { ...fakes, transport, states };
}

async function connected() {
	const ctx = setup();
	const connecting = ctx.transport.connect();
	ctx.latest().acceptOpen();
	await connecting;
	return ctx;
}

describe('experimentSocketUrl', () => {
	it('follows the page protocol', () => {
		expect(experimentSocketUrl({ protocol: 'http:', host: 'lab.test:8000' }, 7)).toBe(
			'ws://lab.test:8000/ws/experiment/7/'
		);
		expect(experimentSocketUrl({ protocol: 'https:', host: 'lab.test' }, 12)).toBe(
			'wss://lab.test/ws/experiment/12/'
		);
	});
});

describe('WebSocketTransport', () => {
	beforeEach(() => {
		vi.useFakeTimers();
		vi.spyOn(console, 'log').mockImplementation(() => {});
		vi.spyOn(console, 'warn').mockImplementation(() => {});
		vi.spyOn(console, 'error').mockImplementation(() => {});
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	it('resolves connect when the socket opens', async () => {
		const { transport, states, sockets } = await connected();
		expect(sockets[0].url).toBe(URL);
		expect(transport.state).toBe('connected');
		expect(states).toEqual(['connecting', 'connected']);
	});

	it('rejects connect and closes the socket after 5 s', async () => {
		const { transport, latest } = setup();
		const connecting = transport.connect();
		const assertion = expect(connecting).rejects.toThrow('Connection to the server timed out');

		await vi.advanceTimersByTimeAsync(4999);
		expect(latest().closed).toBe(false);
		await vi.advanceTimersByTimeAsync(1);

		await assertion;
		expect(latest().closed).toBe(true);
		expect(transport.state).toBe('disconnected');
	});

	it('rejects connect with a TransportError on socket error', async () => {
		const { transport, latest } = setup();
		const connecting = transport.connect();
		latest().failToConnect();
		await expect(connecting).rejects.toBeInstanceOf(TransportError);
	});

	it('ignores a late open from a socket that already timed out', async () => {
		const { transport, latest } = setup();
		const assertion = expect(transport.connect()).rejects.toThrow(TransportError);
		await vi.advanceTimersByTimeAsync(5000);
		await assertion;

		latest().acceptOpen();
		expect(transport.state).toBe('disconnected');
	});

	it('send returns false when not connected', () => {
		const { transport, sockets } = setup();
		expect(transport.send({ type: 'start_recording', step: 1 })).toBe(false);
		expect(sockets).toHaveLength(0);
	});

	it('sends JSON frames when connected', async () => {
		const { transport, latest } = await connected();
		expect(transport.send({ type: 'stop_recording', step: 3 })).toBe(true);
		expect(latest().sent).toEqual(['{"type":"stop_recording","step":3}']);
	});

	it('delivers parsed messages and drops malformed frames', async () => {
		const { transport, latest } = await connected();
		const received: InboundMessage[] = [];
		transport.onMessage((message) => received.push(message));

		latest().receive('{oops');
		latest().receive({ type: 'recording_started', step: 1 });

		expect(console.error).toHaveBeenCalledWith(
			'[WebSocket] Dropping malformed frame: Inbound frame is not valid JSON'
		);
		expect(received).toEqual([{ type: 'recording_started', step: 1 }]);
	});

	it('reconnects 5 times, 3 s apart, then parks in failed', async () => {
		const { transport, states, sockets, latest } = await connected();

		latest().drop('server restart');
		expect(transport.state).toBe('disconnected');

		for (let attempt = 1; attempt <= 5; attempt++) {
			await vi.advanceTimersByTimeAsync(2999);
			expect(sockets).toHaveLength(attempt);
			await vi.advanceTimersByTimeAsync(1);
			expect(sockets).toHaveLength(attempt + 1);
			latest().failToConnect();
		}

		await vi.advanceTimersByTimeAsync(60_000);
		expect(sockets).toHaveLength(6);
		expect(transport.state).toBe('failed');
		expect(states.filter((s) => s === 'failed')).toHaveLength(1);
	});

	it('resets the attempt count after a successful reconnect', async () => {
		const { transport, latest } = await connected();

		latest().drop();
		await vi.advanceTimersByTimeAsync(3000);
		expect(transport.reconnectAttempts).toBe(1);
		latest().acceptOpen();

		expect(transport.state).toBe('connected');
		expect(transport.reconnectAttempts).toBe(0);
	});

	it('does not reconnect after disconnect()', async () => {
		const { transport, sockets, latest } = await connected();

		latest().drop();
		transport.disconnect();
		await vi.advanceTimersByTimeAsync(10_000);

		expect(sockets).toHaveLength(1);
		expect(transport.state).toBe('disconnected');
	});
});
