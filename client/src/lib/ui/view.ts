/**
 * DOM bindings for the experiment page.
 *
 * Reads the session and status stores and renders into the server-rendered
 * markup; user actions are forwarded to the controller. Returns a function
 * that removes every listener and subscription.
 */

import type { ExperimentApp } from '../app.js';
import { ValidationError } from '../experiment/errors.js';
import { estimateSteps, percentError, type StepEstimate } from '../experiment/physics.js';
import { REFERENCE_GAMMA, type SessionSnapshot, type StepRecord, type VerificationResult } from '../experiment/types.js';
import { parseNumericInput } from '../experiment/validation.js';
import type { Notification } from '../stores/notifications.js';
import { connectionLabel, equipmentLabel, formatDistance, recordingLabel } from '../stores/status.js';

export type ViewDependencies = Pick<
	ExperimentApp,
	'controller' | 'session' | 'notifier' | 'status' | 'capture' | 'settings'
>;

export function stepButtonLabel(record: StepRecord, activeCapture: number | null): string {
	if (activeCapture === record.stepNumber) return 'Stop';
	switch (record.status) {
		case 'pending':
			return 'Start recording';
		case 'recording':
			return 'Processing…';
		case 'processed':
			return 'Done';
	}
}

/** One line of the local estimate summary; null until the step has two minima */
export function formatEstimate({ step, speed, gamma }: StepEstimate): string | null {
	if (speed === null || gamma === null) return null;
	const deviation = percentError(gamma, REFERENCE_GAMMA);
	const sign = deviation > 0 ? '+' : '';
	return (
		`Step ${step}: v ≈ ${speed.toFixed(1)} m/s, γ ≈ ${gamma.toFixed(3)} ` +
		`(${sign}${deviation.toFixed(1)}% from ${REFERENCE_GAMMA})`
	);
}

function stepButtonDisabled(record: StepRecord, snapshot: SessionSnapshot): boolean {
	if (snapshot.activeCapture === record.stepNumber) return false;
	return record.status !== 'pending' || snapshot.activeCapture !== null || snapshot.completed;
}

function formatVerification(result: VerificationResult): string {
	const lines = [
		result.isValid ? 'Results accepted.' : 'Results differ from the measured values.',
		`Speed of sound: yours ${result.studentSpeed.toFixed(2)} m/s, measured ${result.systemSpeed.toFixed(2)} m/s`,
		`γ: yours ${result.studentGamma.toFixed(3)}, measured ${result.systemGamma.toFixed(3)}`
	];
	if (result.speedError !== null) lines.push(`Speed error: ${result.speedError.toFixed(2)}%`);
	if (result.gammaErrorReference !== null) {
		lines.push(`γ error vs 1.4: ${result.gammaErrorReference.toFixed(2)}%`);
	}
	return [...lines, ...result.errors].join('\n');
}

export function bindExperimentView(root: Document | HTMLElement, deps: ViewDependencies): () => void {
	const { controller, session, notifier, status, capture, settings } = deps;
	const doc = root instanceof Document ? root : root.ownerDocument;
	const listeners = new AbortController();
	const { signal } = listeners;
	const unsubscribers: Array<() => void> = [];

	const byId = <T extends HTMLElement>(id: string) => root.querySelector<T>(`#${id}`);
	const report = (err: unknown) => console.error('[View] Action failed:', err);

	// ── Stage cards ──────────────────────────────────────────────────────

	const cards = Array.from(root.querySelectorAll<HTMLElement>('.stage-card'));
	const temperatureInput = byId<HTMLInputElement>('temperatureInput');

	for (const card of cards) {
		const button = card.querySelector<HTMLButtonElement>('.record-btn[data-stage]');
		if (!button) continue;
		const step = Number(button.dataset.stage);
		const freqInput = card.querySelector<HTMLInputElement>('.stage-freq');
		const errorBox = card.querySelector<HTMLElement>('.stage-error');

		const showError = (message: string) => {
			if (errorBox) {
				errorBox.textContent = message;
				errorBox.hidden = message === '';
			}
		};

		button.addEventListener(
			'click',
			() => {
				const snapshot = session.get();
				if (snapshot.activeCapture === step) {
					controller.stopStep(step).catch(report);
					return;
				}
				showError('');
				const params = {
					frequency: parseNumericInput(freqInput?.value ?? ''),
					temperature: parseNumericInput(temperatureInput?.value ?? '')
				};
				controller
					.startStep(step, params)
					.then((result) => {
						if (!result.ok && result.error instanceof ValidationError) {
							showError(result.error.message);
						}
					})
					.catch(report);
			},
			{ signal }
		);
	}

	temperatureInput?.addEventListener(
		'change',
		() => {
			const result = controller.setTemperature(parseNumericInput(temperatureInput.value));
			if (!result.ok) notifier.notify('warning', result.error.message);
		},
		{ signal }
	);

	const renderSession = (snapshot: SessionSnapshot) => {
		for (const card of cards) {
			const button = card.querySelector<HTMLButtonElement>('.record-btn[data-stage]');
			if (!button) continue;
			const record = snapshot.steps.find((s) => s.stepNumber === Number(button.dataset.stage));
			if (!record) continue;
			button.textContent = stepButtonLabel(record, snapshot.activeCapture);
			button.disabled = stepButtonDisabled(record, snapshot);
			card.classList.toggle('active', snapshot.currentStep === record.stepNumber);
			card.classList.toggle('processed', record.status === 'processed');
		}

		for (const record of snapshot.steps) {
			const list = byId<HTMLElement>(`minima-list-step-${record.stepNumber}`);
			if (!list) continue;
			list.replaceChildren(
				...record.minima.map((m, i) => {
					const item = doc.createElement('li');
					item.textContent = `k=${i + 1}: ${(m.position * 1000).toFixed(1)} mm (amplitude ${m.amplitude.toFixed(3)})`;
					return item;
				})
			);
		}

		const estimates = byId<HTMLElement>('step_estimates');
		if (estimates) {
			const lines = estimateSteps(snapshot)
				.map(formatEstimate)
				.filter((line): line is string => line !== null);
			estimates.replaceChildren(
				...lines.map((line) => {
					const item = doc.createElement('li');
					item.textContent = line;
					return item;
				})
			);
		}

		const blocked = snapshot.isSaving || snapshot.completed;
		for (const id of ['saveParamsBtn', 'completeExperimentBtn']) {
			const button = byId<HTMLButtonElement>(id);
			if (button) button.disabled = blocked;
		}

		const resultDisplay = byId<HTMLElement>('result_display');
		if (resultDisplay) {
			resultDisplay.textContent = snapshot.verification ? formatVerification(snapshot.verification) : '';
			resultDisplay.classList.toggle('valid', snapshot.verification?.isValid === true);
		}
	};
	unsubscribers.push(session.subscribe(renderSession));

	// ── Equipment ────────────────────────────────────────────────────────

	byId<HTMLButtonElement>('connectEquipmentBtn')?.addEventListener(
		'click',
		() => {
			controller.connectSensor().catch(report);
		},
		{ signal }
	);

	const portPathInput = byId<HTMLInputElement>('portPathInput');
	if (portPathInput && portPathInput.value === '') {
		portPathInput.value = settings.get().portPath;
	}
	byId<HTMLButtonElement>('connectToPortBtn')?.addEventListener(
		'click',
		() => {
			const path = portPathInput?.value.trim() ?? '';
			if (path === '') {
				notifier.notify('warning', 'Enter a port, e.g. usbVendorId=9025');
				return;
			}
			controller.connectSensorToPort(path).catch(report);
		},
		{ signal }
	);

	// ── Saving and results ───────────────────────────────────────────────

	byId<HTMLButtonElement>('saveParamsBtn')?.addEventListener('click', () => controller.saveParams(), { signal });
	byId<HTMLButtonElement>('completeExperimentBtn')?.addEventListener(
		'click',
		() => controller.completeExperiment(),
		{ signal }
	);

	byId<HTMLButtonElement>('submit_results_button')?.addEventListener(
		'click',
		() => {
			const speed = parseNumericInput(byId<HTMLInputElement>('student_speed')?.value ?? '');
			const gamma = parseNumericInput(byId<HTMLInputElement>('student_gamma')?.value ?? '');
			const result = controller.submitResults(speed, gamma);
			const display = byId<HTMLElement>('result_display');
			if (!result.ok && result.error instanceof ValidationError && display) {
				display.textContent = result.error.message;
			}
		},
		{ signal }
	);

	// ── Indicators ───────────────────────────────────────────────────────

	const bindText = (id: string, store: { subscribe(run: (value: string) => void): () => void }) => {
		const el = byId<HTMLElement>(id);
		if (!el) return;
		unsubscribers.push(
			store.subscribe((text) => {
				el.textContent = text;
			})
		);
	};
	bindText('connectionStatus', connectionLabel(status.connection));
	bindText('equipmentStatus', equipmentLabel(status.equipment));
	bindText('recordingStatus', recordingLabel(capture.status));

	const distanceEl = byId<HTMLElement>('currentDistance');
	if (distanceEl) {
		unsubscribers.push(
			status.distance.subscribe((reading) => {
				distanceEl.textContent = formatDistance(reading);
				distanceEl.classList.toggle('error', reading?.error === true);
			})
		);
	}

	const alerts = byId<HTMLElement>('alertsContainer');
	if (alerts) {
		const renderAlert = (notification: Notification) => {
			const item = doc.createElement('div');
			item.className = `alert alert-${notification.level}`;
			item.dataset.id = String(notification.id);
			const text = doc.createElement('span');
			text.textContent = notification.message;
			const close = doc.createElement('button');
			close.type = 'button';
			close.className = 'alert-close';
			close.textContent = '×';
			close.addEventListener('click', () => notifier.dismiss(notification.id), { signal });
			item.append(text, close);
			return item;
		};
		unsubscribers.push(
			notifier.notifications.subscribe((list) => {
				alerts.replaceChildren(...list.map(renderAlert));
			})
		);
	}

	return () => {
		listeners.abort();
		for (const unsubscribe of unsubscribers) unsubscribe();
	};
}
