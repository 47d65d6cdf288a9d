/**
 * Message router: dispatches parsed inbound messages to typed handlers.
 *
 * Handlers are declared per message variant, so adding a variant to
 * InboundMessage without a handler is a compile error.
 */

import type { Transport } from '../transport/transport.js';
import type { InboundMessage, InboundMessageType } from './messages.js';

export type MessageHandlers = {
	[K in Exclude<InboundMessageType, 'unknown'>]: (
		message: Extract<InboundMessage, { type: K }>
	) => void | Promise<void>;
};

export interface MessageRouterOptions {
	/** Called when a handler throws or rejects */
	onHandlerError?: (error: unknown, message: InboundMessage) => void;
}

function assertNever(value: never): never {
	throw new Error(`Unhandled message variant: ${JSON.stringify(value)}`);
}

export class MessageRouter {
	private readonly onHandlerError: (error: unknown, message: InboundMessage) => void;

	constructor(
		private readonly handlers: MessageHandlers,
		options: MessageRouterOptions = {}
	) {
		this.onHandlerError = options.onHandlerError ?? (() => {});
	}

	/** Subscribe to a transport's inbound message stream */
	attach(transport: Pick<Transport, 'onMessage'>): void {
		transport.onMessage((message) => this.dispatch(message));
	}

	/** Invoke exactly one handler for the message; never throws */
	dispatch(message: InboundMessage): void {
		try {
			const result = this.invoke(message);
			if (result instanceof Promise) {
				result.catch((err: unknown) => this.fail(err, message));
			}
		} catch (err) {
			this.fail(err, message);
		}
	}

	private invoke(message: InboundMessage): void | Promise<void> {
		switch (message.type) {
			case 'step_confirmation':
				return this.handlers.step_confirmation(message);
			case 'recording_started':
				return this.handlers.recording_started(message);
			case 'recording_stopped':
				return this.handlers.recording_stopped(message);
			case 'minima_data':
				return this.handlers.minima_data(message);
			case 'parameters_updated':
				return this.handlers.parameters_updated(message);
			case 'experiment_complete':
				return this.handlers.experiment_complete(message);
			case 'verification_result':
				return this.handlers.verification_result(message);
			case 'error':
				return this.handlers.error(message);
			case 'unknown':
				console.warn(`[Router] Unknown message type: ${message.originalType}`, message.payload);
				return;
			default:
				return assertNever(message);
		}
	}

	private fail(err: unknown, message: InboundMessage): void {
		console.error(`[Router] Handler for ${message.type} failed:`, err);
		this.onHandlerError(err, message);
	}
}
