/**
 * Progress helpers for loading and other long-running steps.
 *
 * Functions that take a while accept an `onProgress` callback and report
 * plain `Progress` payloads through it. The default callback logs to the
 * console.
 *
 * @module
 */

/** Progress payload containing a message and timestamp. */
export type Progress = {
	msg: string
	timestamp: number
}

/** Callback receiving progress updates. */
export type ProgressCallback = (progress: Progress) => void

/**
 * Create a Progress payload with current timestamp.
 */
export function progress(msg: string): Progress {
	return {
		msg,
		timestamp: Date.now(),
	}
}

/**
 * Log a progress message to the console.
 */
export function logProgress(progress: Progress) {
	console.log(progress.msg)
}

/** Discard progress updates. */
export function ignoreProgress(_progress: Progress) {}
