/**
 * User-facing notifications (the alerts area).
 */

import { writable, type Readable } from 'svelte/store';

export type NotificationLevel = 'info' | 'success' | 'warning' | 'error';

export interface Notification {
	id: number;
	level: NotificationLevel;
	message: string;
}

export interface Notifier {
	readonly notifications: Readable<Notification[]>;
	notify(level: NotificationLevel, message: string): number;
	dismiss(id: number): void;
	clear(): void;
}

/** Oldest notifications are dropped beyond this */
const MAX_VISIBLE = 5;

export function createNotifier(): Notifier {
	const { subscribe, update, set } = writable<Notification[]>([]);
	let nextId = 1;

	return {
		notifications: { subscribe },
		notify(level, message) {
			const id = nextId++;
			update((list) => [...list, { id, level, message }].slice(-MAX_VISIBLE));
			if (level === 'error') {
				console.error(`[Notify] ${message}`);
			} else {
				console.log(`[Notify] ${level}: ${message}`);
			}
			return id;
		},
		dismiss(id) {
			update((list) => list.filter((n) => n.id !== id));
		},
		clear() {
			set([]);
		}
	};
}
