import { describe, expect, it } from 'vitest';
import { parsePortSelector, parseSensorLine, portMatches } from './protocol.js';

describe('parseSensorLine', () => {
	it('parses JSON distance lines', () => {
		expect(parseSensorLine('{"type":"distance","value":123.4,"timestamp":1000}')).toEqual({
			kind: 'distance',
			value: 123.4,
			timestamp: 1000
		});
	});

	it('keeps the error sentinel and a missing timestamp', () => {
		expect(parseSensorLine('{"type":"distance","value":-1}')).toEqual({
			kind: 'distance',
			value: -1,
			timestamp: null
		});
	});

	it('parses legacy plain-text lines', () => {
		expect(parseSensorLine('distance:87.5\r')).toEqual({ kind: 'legacy', value: 87.5 });
	});

	it('ignores other message types and noise', () => {
		expect(parseSensorLine('{"type":"status","ok":true}')).toEqual({
			kind: 'ignored',
			reason: 'unhandled type: status'
		});
		expect(parseSensorLine('booting...').kind).toBe('ignored');
		expect(parseSensorLine('').kind).toBe('ignored');
		expect(parseSensorLine('{"type":"distance","value":"far"}').kind).toBe('ignored');
	});
});

describe('parsePortSelector', () => {
	it('reads USB ids in decimal or hex', () => {
		expect(parsePortSelector('usbVendorId=9025,usbProductId=67')).toEqual({
			kind: 'usb',
			vendorId: 9025,
			productId: 67
		});
		expect(parsePortSelector('vid=0x2341')).toEqual({ kind: 'usb', vendorId: 0x2341, productId: null });
	});

	it('treats anything else as a path', () => {
		expect(parsePortSelector(' /dev/ttyUSB0 ')).toEqual({ kind: 'path', path: '/dev/ttyUSB0' });
	});
});

describe('portMatches', () => {
	const arduino = { usbVendorId: 9025, usbProductId: 67 };

	it('matches by vendor and optional product id', () => {
		expect(portMatches(arduino, { kind: 'usb', vendorId: 9025, productId: null })).toBe(true);
		expect(portMatches(arduino, { kind: 'usb', vendorId: 9025, productId: 68 })).toBe(false);
	});

	it('matches by reported path or name', () => {
		expect(portMatches({ path: 'COM3' }, { kind: 'path', path: 'COM3' })).toBe(true);
		expect(portMatches({ name: 'simulated' }, { kind: 'path', path: 'simulated' })).toBe(true);
		expect(portMatches(arduino, { kind: 'path', path: '' })).toBe(false);
	});
});
