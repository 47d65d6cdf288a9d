/**
 * Stand-in serial port for running the lab without the rangefinder.
 *
 * Emits the same JSON lines as the real firmware: a triangle sweep of the
 * probe between minMm and maxMm, one sample every intervalMs.
 */

import { defaultTimers, type TimerHandle, type Timers } from '../transport/retry.js';
import type { SensorPortInfo } from './protocol.js';
import type { SensorPort } from './reader.js';

export interface SimulatedSerialPortOptions {
	intervalMs?: number;
	minMm?: number;
	maxMm?: number;
	stepMm?: number;
	now?: () => number;
	timers?: Timers;
}

export class SimulatedSerialPort implements SensorPort {
	private readonly intervalMs: number;
	private readonly minMm: number;
	private readonly maxMm: number;
	private readonly stepMm: number;
	private readonly now: () => number;
	private readonly timers: Timers;
	private stream: ReadableStream<Uint8Array> | null = null;
	private timer: TimerHandle | null = null;
	private position: number;
	private direction = 1;

	constructor(options: SimulatedSerialPortOptions = {}) {
		this.intervalMs = options.intervalMs ?? 100;
		this.minMm = options.minMm ?? 0;
		this.maxMm = options.maxMm ?? 450;
		this.stepMm = options.stepMm ?? 5;
		this.now = options.now ?? Date.now;
		this.timers = options.timers ?? defaultTimers;
		this.position = this.minMm;
	}

	get readable(): ReadableStream<Uint8Array> | null {
		return this.stream;
	}

	async open(_options: { baudRate: number }): Promise<void> {
		if (this.stream) throw new Error('The port is already open.');

		const encoder = new TextEncoder();
		this.stream = new ReadableStream<Uint8Array>({
			start: (controller) => {
				const tick = () => {
					const line = JSON.stringify({
						type: 'distance',
						value: this.position,
						timestamp: this.now()
					});
					controller.enqueue(encoder.encode(line + '\n'));
					this.advance();
					this.timer = this.timers.setTimeout(tick, this.intervalMs);
				};
				this.timer = this.timers.setTimeout(tick, this.intervalMs);
			},
			cancel: () => this.stopTimer()
		});
	}

	async close(): Promise<void> {
		this.stopTimer();
		this.stream = null;
	}

	getInfo(): SensorPortInfo {
		return { name: 'simulated' };
	}

	private advance(): void {
		const next = this.position + this.direction * this.stepMm;
		if (next > this.maxMm || next < this.minMm) {
			this.direction = -this.direction;
		}
		this.position += this.direction * this.stepMm;
	}

	private stopTimer(): void {
		if (this.timer !== null) {
			this.timers.clearTimeout(this.timer);
			this.timer = null;
		}
	}
}
