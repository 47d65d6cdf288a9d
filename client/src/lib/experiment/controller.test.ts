import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { get } from 'svelte/store';
import { createExperimentApp } from '../app.js';
import {
	FakeRecorderEngine,
	FakeSerialPort,
	FakeStream,
	createFakeSockets,
	fakeSerialProvider,
	flush
} from '../testing/fakes.js';
import type { SensorPortProvider } from '../sensor/reader.js';
import { DeviceError, ValidationError } from './errors.js';

const URL = 'ws://lab.test/ws/experiment/7/';

interface SetupOptions {
	chosenPort?: boolean;
	getStream?: () => Promise<FakeStream>;
	serialProvider?: SensorPortProvider;
}

/** A getStream whose result the test settles by hand */
function heldStream() {
	let settle: (outcome: FakeStream | Error) => void = () => {};
	const getStream = () =>
		new Promise<FakeStream>((resolve, reject) => {
			settle = (outcome) => (outcome instanceof Error ? reject(outcome) : resolve(outcome));
		});
	return { getStream, settle: (outcome: FakeStream | Error) => settle(outcome) };
}

function setup(options: SetupOptions = {}) {
	const sockets = createFakeSockets();
	const port = new FakeSerialPort({ usbVendorId: 9025 });
	const simulated = new FakeSerialPort({ name: 'simulated' });
	const streams: FakeStream[] = [];
	const app = createExperimentApp({
		experimentId: 7,
		url: URL,
		createSocket: sockets.factory,
		captureDevices: {
			getStream:
				options.getStream ??
				(async () => {
					const stream = new FakeStream();
					streams.push(stream);
					return stream;
				}),
			createEngine: () => new FakeRecorderEngine()
		},
		serialProvider:
			options.serialProvider ??
			fakeSerialProvider([port], options.chosenPort === false ? undefined : port),
		createSimulatedPort: () => simulated,
		storage: null
	});

	const sent = () => sockets.latest().messages();
	const sentOfType = (type: string) =>
		sent().filter((m) => typeof m === 'object' && m !== null && 'type' in m && m.type === type);
	const notices = () => get(app.notifier.notifications).map((n) => `${n.level}: ${n.message}`);

	return { app, sockets, port, simulated, streams, sent, sentOfType, notices };
}

async function connectedSetup(options: SetupOptions = {}) {
	const ctx = setup(options);
	const connecting = ctx.app.controller.connect();
	ctx.sockets.latest().acceptOpen();
	expect(await connecting).toBe(true);
	return ctx;
}

type Context = Awaited<ReturnType<typeof connectedSetup>>;

async function record(ctx: Context, step: number) {
	const { controller } = ctx.app;
	expect(await controller.startStep(step, { frequency: 1500, temperature: 20 })).toEqual({ ok: true });
	expect(await controller.stopStep(step)).toEqual({ ok: true });
}

async function recordAndProcess(ctx: Context, step: number) {
	await record(ctx, step);
	ctx.sockets.latest().receive({
		type: 'minima_data',
		step,
		minima: [
			{ distance_m: 0.1, amplitude: 0.5 },
			{ distance_m: 0.21, amplitude: 0.4 }
		]
	});
}

describe('ExperimentController', () => {
	beforeEach(() => {
		vi.spyOn(console, 'log').mockImplementation(() => {});
		vi.spyOn(console, 'warn').mockImplementation(() => {});
		vi.spyOn(console, 'error').mockImplementation(() => {});
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	it('reports a failed connection', async () => {
		const { app, sockets, notices } = setup();
		const connecting = app.controller.connect();
		sockets.latest().failToConnect();

		expect(await connecting).toBe(false);
		expect(notices()).toEqual(['error: Could not connect to the server']);
	});

	it('runs a step end to end and sends one complete_audio', async () => {
		const ctx = await connectedSetup();
		const { controller, session } = ctx.app;

		expect(await controller.startStep(1, { frequency: 1500, temperature: 20 })).toEqual({ ok: true });
		expect(ctx.sent()).toEqual([
			{ type: 'experiment_params', step: 1, frequency: 1500, temperature: 20 },
			{ type: 'start_recording', step: 1 }
		]);

		ctx.sockets.latest().receive({ type: 'step_confirmation', step: 1, status: 'ok' });
		expect(session.get().steps[0].confirmed).toBe(true);

		expect(await controller.stopStep(1)).toEqual({ ok: true });

		const audio = ctx.sentOfType('complete_audio');
		expect(audio).toHaveLength(1);
		expect(audio[0]).toMatchObject({ step: 1, frequency: 1500, temperature: 20, format: 'webm' });
		expect(audio[0]).toHaveProperty('data', 'AQIDBA==');
		expect(ctx.sent().at(-1)).toEqual({ type: 'stop_recording', step: 1 });
		expect(session.get().activeCapture).toBeNull();
		expect(session.get().steps[0].status).toBe('recording');
	});

	it('returns validation errors without notifying or sending', async () => {
		const ctx = await connectedSetup();

		const result = await ctx.app.controller.startStep(1, { frequency: 900, temperature: 20 });

		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error).toBeInstanceOf(ValidationError);
		expect(ctx.sent()).toEqual([]);
		expect(ctx.notices()).toEqual([]);
	});

	it('refuses to start a step while disconnected', async () => {
		const { app, notices } = setup();

		const result = await app.controller.startStep(1, { frequency: 1500, temperature: 20 });

		expect(result.ok).toBe(false);
		expect(notices()).toEqual(['error: Not connected to the server']);
		expect(app.session.get().steps[0].status).toBe('pending');
	});

	it('warns when recording without a distance sensor', async () => {
		const ctx = await connectedSetup();
		await ctx.app.controller.startStep(1, { frequency: 1500, temperature: 20 });
		expect(ctx.notices()).toEqual(['warning: No distance sensor connected; only audio will be recorded']);
	});

	it('ignores a stop for a step that is not capturing', async () => {
		const ctx = await connectedSetup();
		expect(await ctx.app.controller.stopStep(2)).toEqual({ ok: true });
		expect(ctx.sent()).toEqual([]);
	});

	it('auto-stops once when the distance passes 500 mm and attaches the samples', async () => {
		const ctx = await connectedSetup();
		const { controller, session } = ctx.app;
		expect(await controller.connectSensor()).toBe(true);
		await controller.startStep(1, { frequency: 1500, temperature: 20 });

		ctx.port.pushDistance(300, 1000);
		ctx.port.pushDistance(550, 1100);
		ctx.port.pushDistance(560, 1200);
		await vi.waitFor(() => expect(ctx.sentOfType('stop_recording')).toHaveLength(1));
		ctx.port.pushDistance(400, 1300);
		ctx.port.pushDistance(600, 1400);
		await flush();

		const audio = ctx.sentOfType('complete_audio');
		expect(audio).toHaveLength(1);
		expect(audio[0]).toMatchObject({ distances: [300, 550], timestamps: [0, 0.1] });
		expect(ctx.sentOfType('stop_recording')).toHaveLength(1);
		expect(session.get().activeCapture).toBeNull();
	});

	it('finishes a stop that arrives while the microphone is still opening', async () => {
		const mic = heldStream();
		const ctx = await connectedSetup({ getStream: mic.getStream });
		const { controller, session, capture, status } = ctx.app;
		await controller.connectSensor();

		const starting = controller.startStep(1, { frequency: 1500, temperature: 20 });
		ctx.port.pushDistance(300, 1000);
		ctx.port.pushDistance(550, 1100);
		await vi.waitFor(() => expect(get(status.distance)).toEqual({ value: 550, error: false }));
		expect(ctx.sentOfType('stop_recording')).toEqual([]);

		const stream = new FakeStream();
		mic.settle(stream);
		expect(await starting).toEqual({ ok: true });

		const audio = ctx.sentOfType('complete_audio');
		expect(audio).toHaveLength(1);
		expect(audio[0]).toMatchObject({ step: 1, distances: [300, 550], timestamps: [0, 0.1] });
		expect(ctx.sentOfType('stop_recording')).toHaveLength(1);
		expect(capture.isRecording()).toBe(false);
		expect(stream.tracks[0].stopped).toBe(true);
		expect(session.get().activeCapture).toBeNull();
		expect(session.get().steps[0].status).toBe('recording');
	});

	it('rolls a step back cleanly when the microphone is denied', async () => {
		const mic = heldStream();
		const ctx = await connectedSetup({ getStream: mic.getStream });
		const { controller, session, capture, sensor, status } = ctx.app;
		await controller.connectSensor();

		const starting = controller.startStep(1, { frequency: 1500, temperature: 20 });
		ctx.port.pushDistance(300, 1000);
		await vi.waitFor(() => expect(get(status.distance)).toEqual({ value: 300, error: false }));
		mic.settle(new DOMException('Permission denied', 'NotAllowedError'));

		const result = await starting;
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error).toBeInstanceOf(DeviceError);
		expect(ctx.sent()).toEqual([
			{ type: 'experiment_params', step: 1, frequency: 1500, temperature: 20 },
			{ type: 'start_recording', step: 1 },
			{ type: 'stop_recording', step: 1 }
		]);
		expect(session.get().activeCapture).toBeNull();
		expect(session.get().steps[0].status).toBe('pending');
		expect(capture.isRecording()).toBe(false);
		expect(sensor.isRecording()).toBe(false);
		expect(sensor.stopRecording()).toEqual({ distances: [], timestamps: [] });
		expect(ctx.notices().at(-1)).toBe(
			'error: Could not start step 1: Device access denied: Permission denied'
		);
	});

	it('falls back to the simulated sensor when no port is chosen', async () => {
		const ctx = await connectedSetup({ chosenPort: false });

		expect(await ctx.app.controller.connectSensor()).toBe(false);

		expect(ctx.simulated.opened).toBe(true);
		expect(get(ctx.app.status.equipment)).toBe('simulated');
		expect(ctx.notices()).toEqual([
			'error: No device selected: No port selected by the user.',
			'warning: Using a simulated distance sensor'
		]);
	});

	it('remembers the port selector and opens the matching port', async () => {
		const ctx = await connectedSetup();
		expect(await ctx.app.controller.connectSensorToPort('vid=9025')).toBe(true);
		expect(ctx.app.settings.get().portPath).toBe('vid=9025');
		expect(get(ctx.app.status.equipment)).toBe('connected');
	});

	it('does not simulate the sensor for a client fault', async () => {
		const ctx = await connectedSetup({
			serialProvider: {
				requestPort: async () => {
					throw new TypeError('port.open is not a function');
				},
				getPorts: async () => []
			}
		});

		expect(await ctx.app.controller.connectSensor()).toBe(false);

		expect(ctx.simulated.opened).toBe(false);
		expect(get(ctx.app.status.equipment)).toBe('disconnected');
		expect(ctx.notices()).toEqual(['error: port.open is not a function']);
	});

	it('does not send update_all_params without processed steps', async () => {
		const ctx = await connectedSetup();
		expect(ctx.app.controller.saveParams()).toBe(false);
		expect(ctx.sent()).toEqual([]);
		expect(ctx.notices()).toEqual(['warning: No processed steps to save yet']);
	});

	it('saves parameters once at a time and applies the acknowledged temperature', async () => {
		const ctx = await connectedSetup();
		await recordAndProcess(ctx, 1);
		const { controller, session } = ctx.app;

		expect(controller.saveParams()).toBe(true);
		expect(controller.saveParams()).toBe(false);
		expect(session.get().isSaving).toBe(true);

		const saves = ctx.sentOfType('update_all_params');
		expect(saves).toEqual([
			{
				type: 'update_all_params',
				experiment_id: 7,
				temperature: 20,
				pressure_pa: 101325,
				molar_mass_kg_mol: 0.0289644,
				stages: [
					{
						step_number: 1,
						frequency: 1500,
						data: [0.1, 0.21],
						labels: [1, 2],
						raw_minima_data: [
							{ distance_m: 0.1, amplitude: 0.5 },
							{ distance_m: 0.21, amplitude: 0.4 }
						]
					}
				]
			}
		]);

		ctx.sockets.latest().receive({
			type: 'parameters_updated_ack',
			status: 'success',
			params: { temperature_celsius: 23 }
		});
		expect(session.get().isSaving).toBe(false);
		expect(session.get().params.temperature).toBe(23);
		expect(ctx.notices().at(-1)).toBe('success: Parameters saved');
	});

	it('clears the saving flag on a server error', async () => {
		const ctx = await connectedSetup();
		await recordAndProcess(ctx, 1);
		ctx.app.controller.saveParams();

		ctx.sockets.latest().receive({ type: 'error', message: 'database unavailable', step: 1 });

		expect(ctx.app.session.get().isSaving).toBe(false);
		expect(ctx.notices().at(-1)).toBe('error: Step 1: database unavailable');
	});

	it('returns a step waiting for minima to pending on a server error', async () => {
		const ctx = await connectedSetup();
		const { controller, session } = ctx.app;
		await record(ctx, 1);
		expect(session.get().steps[0].status).toBe('recording');

		ctx.sockets.latest().receive({ type: 'error', message: 'Audio processing error', step: 1 });

		expect(session.get().steps[0].status).toBe('pending');
		expect(ctx.notices().at(-1)).toBe('error: Step 1: Audio processing error');
		expect(await controller.startStep(1, { frequency: 1500, temperature: 20 })).toEqual({ ok: true });
	});

	it('cancels the capture of a step the server reports an error for', async () => {
		const ctx = await connectedSetup();
		const { controller, session, capture } = ctx.app;
		await controller.startStep(1, { frequency: 1500, temperature: 20 });

		ctx.sockets.latest().receive({ type: 'error', message: 'Audio processing error', step: 1 });

		expect(capture.isRecording()).toBe(false);
		expect(ctx.streams[0].tracks[0].stopped).toBe(true);
		expect(session.get().activeCapture).toBeNull();
		expect(session.get().steps[0].status).toBe('pending');
		expect(ctx.sentOfType('complete_audio')).toEqual([]);
	});

	it('completes the experiment once all three steps are processed', async () => {
		const ctx = await connectedSetup();
		for (const step of [1, 2, 3]) {
			await recordAndProcess(ctx, step);
		}

		const completions = ctx.sentOfType('complete_experiment');
		expect(completions).toHaveLength(1);
		expect(completions[0]).toMatchObject({ experiment_id: 7 });
		expect(ctx.app.session.get().isSaving).toBe(true);

		ctx.sockets.latest().receive({
			type: 'experiment_completed',
			steps: [{ step: 1, speed: 343.2, gamma: 1.4 }]
		});
		const snapshot = ctx.app.session.get();
		expect(snapshot.completed).toBe(true);
		expect(snapshot.isSaving).toBe(false);
		expect(snapshot.finalResults).toEqual([{ step: 1, speed: 343.2, gamma: 1.4 }]);
	});

	it('completes the experiment after a save that was in flight', async () => {
		const ctx = await connectedSetup();
		await recordAndProcess(ctx, 1);
		await recordAndProcess(ctx, 2);
		await record(ctx, 3);
		expect(ctx.app.controller.saveParams()).toBe(true);

		ctx.sockets.latest().receive({
			type: 'minima_data',
			step: 3,
			minima: [
				{ distance_m: 0.1, amplitude: 0.5 },
				{ distance_m: 0.21, amplitude: 0.4 }
			]
		});
		expect(ctx.sentOfType('complete_experiment')).toEqual([]);

		ctx.sockets.latest().receive({ type: 'parameters_updated', status: 'success' });

		const completions = ctx.sentOfType('complete_experiment');
		expect(completions).toHaveLength(1);
		expect(completions[0]).toMatchObject({ experiment_id: 7 });
		expect(ctx.app.session.get().isSaving).toBe(true);
	});

	it('validates and submits final results', async () => {
		const ctx = await connectedSetup();
		const { controller, session } = ctx.app;

		const invalid = controller.submitResults(Number.NaN, 1.4);
		expect(invalid.ok).toBe(false);
		if (!invalid.ok) expect(invalid.error).toMatchObject({ field: 'speed' });

		expect(controller.submitResults(343, 1.4)).toEqual({ ok: true });
		expect(ctx.sent()).toEqual([{ type: 'final_results', studentSpeed: 343, studentGamma: 1.4 }]);

		ctx.sockets.latest().receive({
			type: 'verification_result',
			is_valid: true,
			student_speed: 343,
			system_speed: 344,
			student_gamma: 1.4,
			system_gamma: 1.41
		});
		expect(session.get().verification).toMatchObject({ isValid: true, systemSpeed: 344 });
	});

	it('cancels the active capture and notifies once when the connection is lost for good', async () => {
		vi.useFakeTimers();
		const ctx = await connectedSetup();
		const { controller, session, capture } = ctx.app;
		await record(ctx, 2);
		await controller.startStep(1, { frequency: 1500, temperature: 20 });

		ctx.sockets.latest().drop();
		for (let attempt = 0; attempt < 5; attempt++) {
			await vi.advanceTimersByTimeAsync(3000);
			ctx.sockets.latest().failToConnect();
		}

		expect(get(ctx.app.status.connection)).toBe('failed');
		expect(capture.isRecording()).toBe(false);
		expect(session.get().activeCapture).toBeNull();
		expect(session.get().steps.map((s) => s.status)).toEqual(['pending', 'pending', 'pending']);
		expect(ctx.notices().filter((n) => n.includes('Connection to the server was lost'))).toHaveLength(1);
	});
});
