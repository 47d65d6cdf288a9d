/**
 * WebSocket transport for the experiment control channel.
 *
 * JSON frames in both directions. The initial connect is bounded by a
 * timeout; an unexpected close after the socket has opened starts a bounded
 * reconnect (fixed delay, fixed attempt count). Once attempts are exhausted
 * the transport parks in `failed` and stays there until connect() is called.
 */

import { TransportError, ProtocolError } from '../experiment/errors.js';
import {
	parseInboundMessage,
	serializeMessage,
	type InboundMessage,
	type OutboundMessage
} from '../protocol/messages.js';
import { BoundedRetry, defaultTimers, type TimerHandle, type Timers } from './retry.js';
import type { Transport, TransportState, MessageCallback, StateCallback } from './transport.js';

export const CONNECT_TIMEOUT_MS = 5000;
export const MAX_RECONNECT_ATTEMPTS = 5;
export const RECONNECT_DELAY_MS = 3000;

export interface SocketHandlers {
	onOpen(): void;
	onClose(reason: string): void;
	onError(): void;
	onMessage(data: string): void;
}

/** The part of a WebSocket the transport uses */
export interface SocketHandle {
	isOpen(): boolean;
	send(data: string): void;
	close(): void;
}

export type SocketFactory = (url: string, handlers: SocketHandlers) => SocketHandle;

export const browserSocketFactory: SocketFactory = (url, handlers) => {
	const ws = new WebSocket(url);
	ws.onopen = () => handlers.onOpen();
	ws.onclose = (event) => handlers.onClose(event.reason);
	ws.onerror = () => handlers.onError();
	ws.onmessage = (event) => {
		if (typeof event.data === 'string') {
			handlers.onMessage(event.data);
		} else {
			console.warn('[WebSocket] Ignoring binary frame');
		}
	};
	return {
		isOpen: () => ws.readyState === WebSocket.OPEN,
		send: (data) => ws.send(data),
		close: () => ws.close()
	};
};

/** ws[s]://host/ws/experiment/<id>/ for the page's origin */
export function experimentSocketUrl(
	location: Pick<Location, 'protocol' | 'host'>,
	experimentId: number
): string {
	const protocol = location.protocol === 'https:' ? 'wss:' : 'ws:';
	return `${protocol}//${location.host}/ws/experiment/${experimentId}/`;
}

export interface WebSocketTransportOptions {
	url: string;
	createSocket?: SocketFactory;
	connectTimeoutMs?: number;
	maxReconnectAttempts?: number;
	reconnectDelayMs?: number;
	timers?: Timers;
}

export class WebSocketTransport implements Transport {
	private readonly url: string;
	private readonly createSocket: SocketFactory;
	private readonly connectTimeoutMs: number;
	private readonly timers: Timers;
	private readonly retry: BoundedRetry;
	private socket: SocketHandle | null = null;
	private messageCallbacks: MessageCallback[] = [];
	private stateCallbacks: StateCallback[] = [];
	private _state: TransportState = 'disconnected';
	// Bumped whenever a socket is abandoned so its late events are ignored
	private generation = 0;
	private closedByUser = false;

	constructor(options: WebSocketTransportOptions) {
		this.url = options.url;
		this.createSocket = options.createSocket ?? browserSocketFactory;
		this.connectTimeoutMs = options.connectTimeoutMs ?? CONNECT_TIMEOUT_MS;
		this.timers = options.timers ?? defaultTimers;
		this.retry = new BoundedRetry({
			maxAttempts: options.maxReconnectAttempts ?? MAX_RECONNECT_ATTEMPTS,
			delayMs: options.reconnectDelayMs ?? RECONNECT_DELAY_MS,
			timers: this.timers
		});
	}

	get state(): TransportState {
		return this._state;
	}

	/** Reconnect attempts made since the socket was last open */
	get reconnectAttempts(): number {
		return this.retry.attempts;
	}

	connect(): Promise<void> {
		if (this.isConnected()) return Promise.resolve();
		this.closedByUser = false;
		this.retry.reset();
		return this.open(false);
	}

	disconnect(): void {
		this.closedByUser = true;
		this.retry.reset();
		this.generation++;
		this.socket?.close();
		this.socket = null;
		this.setState('disconnected');
	}

	send(message: OutboundMessage): boolean {
		if (!this.socket || !this.isConnected()) {
			console.error(`[WebSocket] Cannot send ${message.type}: not connected`);
			return false;
		}
		try {
			this.socket.send(serializeMessage(message));
			return true;
		} catch (err) {
			console.error(`[WebSocket] Failed to send ${message.type}:`, err);
			return false;
		}
	}

	isConnected(): boolean {
		return this._state === 'connected' && this.socket !== null && this.socket.isOpen();
	}

	onMessage(callback: MessageCallback): void {
		this.messageCallbacks.push(callback);
	}

	onStateChange(callback: StateCallback): void {
		this.stateCallbacks.push(callback);
	}

	private setState(state: TransportState): void {
		if (this._state === state) return;
		this._state = state;
		for (const cb of this.stateCallbacks) {
			cb(state);
		}
	}

	private open(isReconnect: boolean): Promise<void> {
		this.setState('connecting');
		const generation = ++this.generation;
		const isCurrent = () => generation === this.generation;

		return new Promise<void>((resolve, reject) => {
			let opened = false;
			let settled = false;
			let timeout: TimerHandle | null = null;

			const fail = (error: TransportError) => {
				if (settled) return;
				settled = true;
				if (timeout !== null) this.timers.clearTimeout(timeout);
				if (isCurrent()) {
					this.generation++;
					const socket = this.socket;
					this.socket = null;
					socket?.close();
					this.handleAttemptFailure(isReconnect);
				}
				reject(error);
			};

			timeout = this.timers.setTimeout(() => {
				console.error(`[WebSocket] Connection timed out after ${this.connectTimeoutMs}ms`);
				fail(new TransportError('Connection to the server timed out'));
			}, this.connectTimeoutMs);

			this.socket = this.createSocket(this.url, {
				onOpen: () => {
					if (!isCurrent() || settled) return;
					settled = true;
					opened = true;
					if (timeout !== null) this.timers.clearTimeout(timeout);
					this.retry.reset();
					console.log('[WebSocket] Connected to', this.url);
					this.setState('connected');
					resolve();
				},
				onError: () => {
					if (!isCurrent()) return;
					if (!opened) {
						console.error('[WebSocket] Connection failed');
						fail(new TransportError('Could not connect to the server'));
					} else {
						// A close event always follows; reconnect is handled there
						console.error('[WebSocket] Socket error');
					}
				},
				onClose: (reason) => {
					if (!isCurrent()) return;
					if (!opened) {
						fail(new TransportError('Connection closed before it opened'));
						return;
					}
					this.handleUnexpectedClose(reason);
				},
				onMessage: (data) => {
					if (isCurrent()) this.handleFrame(data);
				}
			});
		});
	}

	private handleUnexpectedClose(reason: string): void {
		this.socket = null;
		this.generation++;
		console.warn(`[WebSocket] Connection closed: ${reason || 'no reason given'}`);
		this.setState('disconnected');
		this.scheduleReconnect();
	}

	private handleAttemptFailure(isReconnect: boolean): void {
		this.setState('disconnected');
		if (isReconnect) this.scheduleReconnect();
	}

	private scheduleReconnect(): void {
		if (this.closedByUser) return;

		const scheduled = this.retry.schedule((attempt) => {
			console.log(`[WebSocket] Reconnect attempt ${attempt}/${this.retry.maxAttempts}`);
			this.open(true).catch((err: unknown) => {
				console.warn(`[WebSocket] Reconnect attempt ${attempt} failed:`, err);
			});
		});

		if (!scheduled && this.retry.exhausted) {
			console.error(`[WebSocket] Giving up after ${this.retry.maxAttempts} reconnect attempts`);
			this.setState('failed');
		}
	}

	private handleFrame(data: string): void {
		let message: InboundMessage;
		try {
			message = parseInboundMessage(data);
		} catch (err) {
			if (err instanceof ProtocolError) {
				console.error(`[WebSocket] Dropping malformed frame: ${err.message}`);
				return;
			}
			throw err;
		}
		for (const cb of this.messageCallbacks) {
			cb(message);
		}
	}
}
