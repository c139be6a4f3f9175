/**
 * Cache hit/miss notices emitted by the resolver.
 *
 * Notices are advisory: listener failures are logged and never reach the
 * caller of the resolver.
 */

import { createLogger } from '../common/logger.js';

const log = createLogger('resolver');
const errorLog = log.extend('error');

export type ResolutionKind = 'hit' | 'miss';

export interface ResolutionNotice {
	/** `hit` when the cached value was returned, `miss` when it was computed */
	kind: ResolutionKind;
	/** Human-readable description */
	message: string;
	/** Holder version the value belongs to */
	version: number;
	/** What was resolved, e.g. 'inverse' */
	label: string;
}

export type ResolutionListener = (notice: ResolutionNotice) => void;

const listeners = new Set<ResolutionListener>();

/**
 * Subscribe to resolution notices from every holder.
 * @returns Unsubscribe function
 */
export function onResolution(listener: ResolutionListener): () => void {
	listeners.add(listener);
	return () => {
		listeners.delete(listener);
	};
}

export function emitNotice(notice: ResolutionNotice): void {
	log('%s (%s, version %d)', notice.message, notice.label, notice.version);

	for (const listener of listeners) {
		try {
			listener(notice);
		} catch (e) {
			errorLog('Resolution listener error (%s): %O', notice.kind, e);
		}
	}
}
