/**
 * Entry point for the experiment page.
 *
 * The server renders the page with `data-experiment-id` on <body>.
 */

import { createExperimentApp } from './lib/app.js';
import { browserCaptureDevices } from './lib/audio/recorder.js';
import { experimentSocketUrl } from './lib/transport/websocket.js';
import { bindExperimentView } from './lib/ui/view.js';

function start(): void {
	const experimentId = Number(document.body.dataset.experimentId);
	if (!Number.isInteger(experimentId) || experimentId <= 0) {
		console.error('[Main] Page has no valid data-experiment-id');
		return;
	}

	const app = createExperimentApp({
		experimentId,
		url: experimentSocketUrl(window.location, experimentId),
		captureDevices: browserCaptureDevices
	});
	const unbind = bindExperimentView(document, app);

	window.addEventListener('pagehide', () => {
		unbind();
		app.controller.dispose().catch((err: unknown) => console.error('[Main] Shutdown failed:', err));
	});

	app.controller
		.connect()
		.then((connected) => {
			if (connected) console.log(`[Main] Experiment ${experimentId} ready`);
		})
		.catch((err: unknown) => console.error('[Main] Connect failed:', err));
}

if (document.readyState === 'loading') {
	document.addEventListener('DOMContentLoaded', start);
} else {
	start();
}
