/**
 * Serial line format of the distance sensor.
 *
 * Current firmware sends one JSON object per line:
 *   {"type":"distance","value":123.4,"timestamp":1712345678901}
 * Negative values mean the sensor could not take a reading. Older firmware
 * sends plain `distance:123.4` lines with no timestamp.
 */

export type SensorLine =
	| { kind: 'distance'; value: number; timestamp: number | null }
	| { kind: 'legacy'; value: number }
	| { kind: 'ignored'; reason: string };

const LEGACY_PREFIX = 'distance:';

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function finiteNumber(value: unknown): number | null {
	if (typeof value === 'number') return Number.isFinite(value) ? value : null;
	if (typeof value === 'string' && value.trim() !== '') {
		const n = Number(value);
		return Number.isFinite(n) ? n : null;
	}
	return null;
}

export function parseSensorLine(line: string): SensorLine {
	const text = line.trim();
	if (text === '') return { kind: 'ignored', reason: 'empty line' };

	if (text.startsWith(LEGACY_PREFIX)) {
		const value = finiteNumber(text.slice(LEGACY_PREFIX.length));
		return value === null
			? { kind: 'ignored', reason: `bad legacy value: ${text}` }
			: { kind: 'legacy', value };
	}

	let raw: unknown;
	try {
		raw = JSON.parse(text);
	} catch {
		return { kind: 'ignored', reason: `not JSON: ${text}` };
	}
	if (!isRecord(raw)) {
		return { kind: 'ignored', reason: `not an object: ${text}` };
	}

	const record = raw;
	if (record.type !== 'distance') {
		return { kind: 'ignored', reason: `unhandled type: ${String(record.type)}` };
	}
	const value = finiteNumber(record.value);
	if (value === null) return { kind: 'ignored', reason: `bad distance value: ${text}` };

	return { kind: 'distance', value, timestamp: finiteNumber(record.timestamp) };
}

// ── Port selection ──────────────────────────────────────────────────────────

export interface SensorPortInfo {
	usbVendorId?: number;
	usbProductId?: number;
	/** Reported by some platforms and by the simulated port */
	path?: string;
	name?: string;
}

export type PortSelector =
	| { kind: 'usb'; vendorId: number; productId: number | null }
	| { kind: 'path'; path: string };

function parseId(text: string): number | null {
	const value = /^0x[0-9a-f]+$/i.test(text) ? Number.parseInt(text.slice(2), 16) : Number(text);
	return Number.isInteger(value) && value >= 0 ? value : null;
}

/**
 * Parse the port field of the connect form.
 * `usbVendorId=9025,usbProductId=67` (or `vid=`/`pid=`, decimal or 0x hex)
 * selects by USB ids; anything else is matched against the port's path/name.
 */
export function parsePortSelector(input: string): PortSelector {
	const text = input.trim();
	let vendorId: number | null = null;
	let productId: number | null = null;

	for (const part of text.split(/[\s,;&]+/)) {
		const [key, value] = part.split('=');
		if (value === undefined) continue;
		const id = parseId(value.trim());
		const name = key.trim().toLowerCase();
		if (name === 'usbvendorid' || name === 'vid') vendorId = id;
		if (name === 'usbproductid' || name === 'pid') productId = id;
	}

	return vendorId !== null ? { kind: 'usb', vendorId, productId } : { kind: 'path', path: text };
}

export function portMatches(info: SensorPortInfo, selector: PortSelector): boolean {
	if (selector.kind === 'usb') {
		if (info.usbVendorId !== selector.vendorId) return false;
		return selector.productId === null || info.usbProductId === selector.productId;
	}
	return selector.path !== '' && (info.path === selector.path || info.name === selector.path);
}
