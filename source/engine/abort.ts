/**
 * Abort utilities for cooperative cancellation.
 */

function normalizeReason(reason: unknown): string {
	if (reason instanceof Error) {
		return reason.message || 'Cancelled';
	}
	if (typeof reason === 'string' && reason.trim().length > 0) {
		return reason;
	}
	if (reason === undefined || reason === null) {
		return 'Cancelled';
	}
	return String(reason);
}

export function getAbortReason(signal?: AbortSignal): string {
	return normalizeReason(signal?.reason);
}

export function createAbortError(reason?: unknown): Error {
	const error = new Error(normalizeReason(reason));
	error.name = 'AbortError';
	return error;
}

export function throwIfAborted(signal?: AbortSignal, context?: string): void {
	if (!signal?.aborted) {
		return;
	}
	const reason = getAbortReason(signal);
	const message = context ? `${context}: ${reason}` : reason;
	throw createAbortError(message);
}

export function isAbortError(error: unknown): boolean {
	if (!(error instanceof Error)) {
		return false;
	}
	const code = 'code' in error ? error.code : undefined;
	return (
		error.name === 'AbortError' ||
		code === 'ABORT_ERR' ||
		code === 'ERR_ABORTED'
	);
}

/**
 * Reject as soon as the signal aborts, otherwise settle with the promise.
 * The abort listener is removed once the race is decided.
 */
export function raceAbort<T>(
	promise: Promise<T>,
	signal: AbortSignal | undefined,
	context?: string,
): Promise<T> {
	if (!signal) return promise;
	throwIfAborted(signal, context);

	return new Promise<T>((resolve, reject) => {
		const onAbort = () => {
			const reason = getAbortReason(signal);
			reject(createAbortError(context ? `${context}: ${reason}` : reason));
		};
		signal.addEventListener('abort', onAbort, {once: true});
		promise.then(
			value => {
				signal.removeEventListener('abort', onAbort);
				resolve(value);
			},
			(error: unknown) => {
				signal.removeEventListener('abort', onAbort);
				reject(error);
			},
		);
	});
}
