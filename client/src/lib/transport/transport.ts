/**
 * Abstract transport interface for the experiment control channel.
 *
 * Implemented by WebSocketTransport. Consumers never see raw frames:
 * inbound data is parsed into InboundMessage before observers are called.
 */

import type { InboundMessage, OutboundMessage } from '../protocol/messages.js';

export type MessageCallback = (message: InboundMessage) => void;
export type StateCallback = (state: TransportState) => void;

/**
 * connecting   - socket opening (first connect or a reconnect attempt)
 * connected    - socket open, sends are accepted
 * disconnected - closed; a reconnect may be pending
 * failed       - reconnect attempts exhausted, no further retries
 */
export type TransportState = 'connecting' | 'connected' | 'disconnected' | 'failed';

export interface Transport {
	/** Current connection state */
	readonly state: TransportState;

	/** Open the connection; rejects on error or timeout */
	connect(): Promise<void>;

	/** Close the connection and cancel any pending reconnect */
	disconnect(): void;

	/** Send a message; returns false (without throwing) when not connected */
	send(message: OutboundMessage): boolean;

	isConnected(): boolean;

	/** Register callback for parsed inbound messages */
	onMessage(callback: MessageCallback): void;

	/** Register callback for state changes */
	onStateChange(callback: StateCallback): void;
}
